import { ProvisionStep } from '../interfaces';

export type ProvisionErrorKind =
  | 'SecretUnavailable'
  | 'FilesystemError'
  | 'UtilityInvocationError'
  | 'MalformedUtilityOutput';

export interface ProvisionErrorDetails {
  step: ProvisionStep;
  /**
   * @description The external utility involved, e.g. ssh-keyscan.
   */
  utility?: string;
  stderr?: string;
  /**
   * @description What the user can do about it.
   */
  remediation?: string;
  cause?: unknown;
}

/**
 * A failed provisioning step. Never thrown past SSHProvisioner.provision;
 * it travels inside the returned ProvisionResult.
 */
export class ProvisionError extends Error {
  readonly kind: ProvisionErrorKind;
  readonly step: ProvisionStep;
  readonly utility?: string;
  readonly stderr?: string;
  readonly remediation?: string;

  constructor(
    kind: ProvisionErrorKind,
    message: string,
    details: ProvisionErrorDetails
  ) {
    super(message, { cause: details.cause });
    this.name = 'ProvisionError';
    this.kind = kind;
    this.step = details.step;
    this.utility = details.utility;
    this.stderr = details.stderr;
    this.remediation = details.remediation;
  }
}

/**
 * @description Renders an unknown thrown value for diagnostics.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * @description True for a filesystem error meaning the path does not exist.
 */
export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * @description True when the path or one of its parents is absent, including
 * a parent that is a regular file rather than a directory.
 */
export function isMissingPath(error: unknown): boolean {
  return (
    isNotFound(error) ||
    (error instanceof Error && 'code' in error && error.code === 'ENOTDIR')
  );
}

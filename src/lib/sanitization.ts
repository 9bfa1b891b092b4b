import * as os from 'os';
import * as path from 'path';

/**
 * Sanitization utilities for configuration, CLI input and secret values
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Normalizes a private key blob: every line trimmed, blank lines at either
 * end dropped, exactly one trailing newline.
 */
export function normalizeKeyMaterial(raw: string): string {
  if (typeof raw !== 'string') {
    throw new ValidationError('Key material must be a string');
  }

  const joined = raw
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .join('\n')
    .trim();

  if (joined.length === 0) {
    throw new ValidationError('Key material is empty');
  }

  return `${joined}\n`;
}

/**
 * Checks for a PEM or OpenSSH private key armor header
 */
export function looksLikePrivateKey(material: string): boolean {
  return /^-----BEGIN [A-Z0-9 ]*PRIVATE KEY-----$/m.test(material);
}

/**
 * Validates secret names. They double as file names for file-backed providers.
 */
export function sanitizeSecretName(name: string): string {
  if (!name || typeof name !== 'string') {
    throw new ValidationError('Secret name is required and must be a string');
  }

  const trimmed = name.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Secret name cannot be empty');
  }

  if (trimmed.length > 100) {
    throw new ValidationError('Secret name cannot exceed 100 characters');
  }

  // Allow alphanumeric, hyphens, underscores, and dots
  if (!/^[a-zA-Z0-9._-]+$/.test(trimmed) || /^\.+$/.test(trimmed)) {
    throw new ValidationError(
      'Secret name can only contain letters, numbers, dots, hyphens, and underscores'
    );
  }

  return trimmed;
}

/**
 * Validates a bare file name inside the SSH directory
 */
export function sanitizeFileName(name: string, fieldName: string): string {
  if (!name || typeof name !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  const trimmed = name.trim();

  if (trimmed.length === 0) {
    throw new ValidationError(`${fieldName} cannot be empty`);
  }

  if (trimmed.length > 255) {
    throw new ValidationError(`${fieldName} cannot exceed 255 characters`);
  }

  if (!/^[a-zA-Z0-9._-]+$/.test(trimmed) || /^\.+$/.test(trimmed)) {
    throw new ValidationError(
      `${fieldName} must be a plain file name (letters, numbers, dots, hyphens, underscores)`
    );
  }

  if (trimmed === 'config' || trimmed === 'known_hosts') {
    throw new ValidationError(`${fieldName} cannot be "${trimmed}"`);
  }

  return trimmed;
}

/**
 * Validates numeric inputs
 */
export function sanitizeNumber(
  value: string,
  fieldName: string,
  min?: number,
  max?: number
): number {
  if (!value || typeof value !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  if (!/^\s*\d+\s*$/.test(value)) {
    throw new ValidationError(`${fieldName} must be a valid number`);
  }

  const num = parseInt(value, 10);

  if (min !== undefined && num < min) {
    throw new ValidationError(`${fieldName} must be at least ${min}`);
  }

  if (max !== undefined && num > max) {
    throw new ValidationError(`${fieldName} cannot exceed ${max}`);
  }

  return num;
}

/**
 * Parses boolean flags given as true/false, yes/no, on/off or 1/0
 */
export function sanitizeBoolean(value: string, fieldName: string): boolean {
  const normalized = value.trim().toLowerCase();

  if (['true', 'yes', 'on', '1'].includes(normalized)) {
    return true;
  }
  if (['false', 'no', 'off', '0'].includes(normalized)) {
    return false;
  }

  throw new ValidationError(`${fieldName} must be true or false`);
}

/**
 * Validates a directory path, expanding a leading ~ to the home directory
 */
export function sanitizeDirectoryPath(
  dirPath: string,
  fieldName: string
): string {
  if (!dirPath || typeof dirPath !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  const trimmed = dirPath.trim();

  if (trimmed.length === 0) {
    throw new ValidationError(`${fieldName} cannot be empty`);
  }

  if (trimmed.includes('\0')) {
    throw new ValidationError(`${fieldName} contains null bytes`);
  }

  const expanded =
    trimmed === '~' || trimmed.startsWith('~/')
      ? path.join(os.homedir(), trimmed.slice(1))
      : trimmed;

  const resolved = path.resolve(expanded);

  if (resolved.length > 500) {
    throw new ValidationError(`${fieldName} path is too long`);
  }

  return resolved;
}

/**
 * Validates SSH hostnames/IPs
 */
export function sanitizeSSHHost(host: string): string {
  if (!host || typeof host !== 'string') {
    throw new ValidationError('SSH host is required');
  }

  const trimmed = host.trim().toLowerCase();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH host cannot be empty');
  }

  if (trimmed.length > 253) {
    throw new ValidationError('SSH host name is too long');
  }

  // Hostnames and IPv4 addresses; the leading character keeps option-like values out of argv
  if (!/^[a-z0-9][a-z0-9.-]*$/.test(trimmed)) {
    throw new ValidationError(
      'SSH host must be a valid hostname or IP address'
    );
  }

  return trimmed;
}

/**
 * Validates SSH usernames
 */
export function sanitizeSSHUsername(username: string): string {
  if (!username || typeof username !== 'string') {
    throw new ValidationError('SSH username is required');
  }

  const trimmed = username.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH username cannot be empty');
  }

  if (trimmed.length > 32) {
    throw new ValidationError('SSH username cannot exceed 32 characters');
  }

  // Unix username validation
  if (!/^[a-z_][a-z0-9_-]*$/.test(trimmed)) {
    throw new ValidationError('SSH username must be a valid Unix username');
  }

  return trimmed;
}

/**
 * Validates the path or name of an external utility
 */
export function sanitizeExecutable(value: string, fieldName: string): string {
  if (!value || typeof value !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  const trimmed = value.trim();

  if (trimmed.length === 0) {
    throw new ValidationError(`${fieldName} cannot be empty`);
  }

  if (/[\x00-\x1F\x7F]/.test(trimmed) || trimmed.startsWith('-')) {
    throw new ValidationError(`${fieldName} is not a valid executable`);
  }

  return trimmed;
}

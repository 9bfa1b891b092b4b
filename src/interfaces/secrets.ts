/**
 * A named credential store. Implementations return undefined when the
 * secret does not exist and throw when the store itself cannot be read.
 */
export interface SecretsProvider {
  readonly description: string;
  get(name: string): string | undefined;
}

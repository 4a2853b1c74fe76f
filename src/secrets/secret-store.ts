/**
 * Secret store boundary.
 *
 * Parameter-store style contract: fetch named parameters, optionally
 * decrypting SecureString values, and report names that do not exist.
 */

import { CredentialKind, ResolvedCredential } from '../domain/credential';

export interface SecretLookup {
  parameters: ResolvedCredential[];
  /** Requested names the store does not hold. */
  invalid: string[];
}

export interface SecretStore {
  getParameters(names: string[], options: { withDecryption: boolean }): Promise<SecretLookup>;
}

/** The store refused to release a parameter to this caller. */
export class SecretStoreAccessError extends Error {
  constructor(
    message: string,
    public readonly names: string[],
  ) {
    super(message);
    this.name = 'SecretStoreAccessError';
  }
}

/**
 * Secret store backed by process environment variables.
 *
 * Credential "registry/password" is read from `<prefix>REGISTRY_PASSWORD`.
 * Every value is reported as a SecureString.
 */
export class EnvSecretStore implements SecretStore {
  constructor(
    private readonly prefix: string,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  static variableName(prefix: string, name: string): string {
    return `${prefix}${name.replace(/[^A-Za-z0-9]/g, '_').toUpperCase()}`;
  }

  async getParameters(names: string[]): Promise<SecretLookup> {
    const parameters: ResolvedCredential[] = [];
    const invalid: string[] = [];
    for (const name of names) {
      const value = this.env[EnvSecretStore.variableName(this.prefix, name)];
      if (value === undefined) {
        invalid.push(name);
      } else {
        const kind: CredentialKind = 'SecureString';
        parameters.push({ name, kind, value });
      }
    }
    return { parameters, invalid };
  }
}

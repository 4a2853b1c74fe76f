/**
 * Credential model.
 *
 * A pipeline declares which credentials exist and which stages may read
 * them. Values are resolved from the secret store at use time and never
 * stored on the run.
 */

/** Secret classes understood by the secret store boundary. */
export type CredentialKind = 'SecureString' | 'String';

export const CREDENTIAL_KINDS: readonly CredentialKind[] = ['SecureString', 'String'];

/** A credential and its scope (the stages allowed to request it). */
export interface CredentialDeclaration {
  name: string;
  kind: CredentialKind;
  allowedStages: string[];
}

/** A value returned by the secret store. */
export interface ResolvedCredential {
  name: string;
  kind: CredentialKind;
  value: string;
}

/** Secret values handed to one stage attempt, keyed by credential name. */
export type StageSecrets = Readonly<Record<string, string>>;

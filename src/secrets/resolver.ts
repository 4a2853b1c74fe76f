/**
 * Secret resolver.
 *
 * Resolves the credentials one stage declared, immediately before that
 * stage's action runs. Scope checks happen before the store is touched, so
 * a stage can never cause a fetch of a credential it is not allowed to see.
 */

import { AccessDeniedError, SecretNotFoundError } from '../domain/errors';
import { CredentialDeclaration, StageSecrets } from '../domain/credential';
import { SecretLookup, SecretStore, SecretStoreAccessError } from './secret-store';

export class SecretResolver {
  constructor(private readonly store: SecretStore) {}

  async resolve(
    stageName: string,
    scopeNames: readonly string[],
    declarations: readonly CredentialDeclaration[],
  ): Promise<StageSecrets> {
    if (scopeNames.length === 0) {
      return Object.freeze({});
    }

    for (const name of scopeNames) {
      const declaration = declarations.find((d) => d.name === name);
      if (!declaration) {
        throw new AccessDeniedError(`Credential "${name}" is not declared by the pipeline`, {
          stageName,
          details: { credential: name },
        });
      }
      if (!declaration.allowedStages.includes(stageName)) {
        throw new AccessDeniedError(`Stage "${stageName}" may not read credential "${name}"`, {
          stageName,
          details: { credential: name, allowedStages: declaration.allowedStages },
        });
      }
    }

    const names = [...new Set(scopeNames)];
    let lookup: SecretLookup;
    try {
      lookup = await this.store.getParameters(names, { withDecryption: true });
    } catch (err) {
      if (err instanceof SecretStoreAccessError) {
        throw new AccessDeniedError(`Secret store denied access: ${err.message}`, {
          stageName,
          details: { credentials: err.names },
        });
      }
      throw err;
    }

    const missing = names.filter(
      (name) => lookup.invalid.includes(name) || !lookup.parameters.some((p) => p.name === name),
    );
    if (missing.length > 0) {
      throw new SecretNotFoundError(missing, { stageName });
    }

    const values: Record<string, string> = {};
    for (const parameter of lookup.parameters) {
      if (names.includes(parameter.name)) {
        values[parameter.name] = parameter.value;
      }
    }
    return Object.freeze(values);
  }
}

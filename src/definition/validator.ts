/**
 * Pipeline definition validator.
 *
 * Validates a pipeline document (parsed JSON) and produces a
 * defaults-applied PipelineDefinition. Errors are typed and carry the path
 * of the offending field; warnings never block a definition.
 */

import { CREDENTIAL_KINDS, CredentialDeclaration, CredentialKind } from '../domain/credential';
import { DeploymentTarget, IMAGE_SELECTIONS, ImageSelection } from '../domain/deployment';
import { SuggestedFix, TypedError, createTypedError } from '../domain/errors';
import { PipelineDefinition } from '../domain/pipeline';
import {
  BackoffStrategy,
  EnvironmentCapability,
  EnvironmentSpec,
  MountRequest,
  RetryPolicy,
  StageAction,
  StageActionKind,
  StageSpec,
} from '../domain/stage';
import {
  DEFAULT_BUILD_CONTEXT,
  DEFAULT_ENVIRONMENTS,
  DEFAULT_PUBLISH_TAGS,
  DEFAULT_RETRY_POLICIES,
  ENV_VAR_PATTERN,
  NAME_PATTERN,
  RETRY_LIMITS,
} from './defaults';

/** Validation result. */
export interface DefinitionValidationResult {
  valid: boolean;
  errors: TypedError[];
  warnings: string[];
  pipeline?: PipelineDefinition;
}

type JsonObject = Record<string, unknown>;

const ACTION_KINDS: readonly string[] = Object.values(StageActionKind);
const CAPABILITIES: readonly string[] = Object.values(EnvironmentCapability);
const BACKOFF_STRATEGIES: readonly BackoffStrategy[] = ['fixed', 'exponential'];

function isRecord(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some((v) => v === value);
}

/** Collects errors and warnings while reading a document. */
class Issues {
  readonly errors: TypedError[] = [];
  readonly warnings: string[] = [];

  error(code: string, path: string, message: string, suggestedFixes?: SuggestedFix[]): void {
    this.errors.push(
      createTypedError({
        code,
        message: `${path}: ${message}`,
        retryable: false,
        details: { path },
        suggestedFixes,
      }),
    );
  }

  warn(path: string, message: string): void {
    this.warnings.push(`${path}: ${message}`);
  }

  string(obj: JsonObject, key: string, path: string): string | undefined {
    const value = obj[key];
    if (typeof value === 'string' && value.trim().length > 0) return value;
    if (value === undefined || value === null) {
      this.error('VALIDATION.REQUIRED_FIELD', `${path}.${key}`, 'is required', [
        { type: 'ADD_FIELD', params: { field: key }, description: `Provide the "${key}" field` },
      ]);
    } else {
      this.error('VALIDATION.INVALID_TYPE', `${path}.${key}`, 'must be a non-empty string');
    }
    return undefined;
  }

  optionalString(obj: JsonObject, key: string, path: string): string | undefined {
    if (obj[key] === undefined) return undefined;
    return this.string(obj, key, path);
  }

  stringArray(obj: JsonObject, key: string, path: string): string[] | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (!Array.isArray(value) || value.some((item) => typeof item !== 'string' || item.length === 0)) {
      this.error('VALIDATION.INVALID_TYPE', `${path}.${key}`, 'must be an array of non-empty strings');
      return undefined;
    }
    return value.filter((item): item is string => typeof item === 'string');
  }

  stringMap(obj: JsonObject, key: string, path: string): Record<string, string> | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (!isRecord(value) || Object.values(value).some((v) => typeof v !== 'string')) {
      this.error('VALIDATION.INVALID_TYPE', `${path}.${key}`, 'must be an object of string values');
      return undefined;
    }
    const out: Record<string, string> = {};
    for (const [k, v] of Object.entries(value)) {
      if (typeof v === 'string') out[k] = v;
    }
    return out;
  }

  object(obj: JsonObject, key: string, path: string): JsonObject | undefined {
    const value = obj[key];
    if (isRecord(value)) return value;
    if (value === undefined) {
      this.error('VALIDATION.REQUIRED_FIELD', `${path}.${key}`, 'is required');
    } else {
      this.error('VALIDATION.INVALID_TYPE', `${path}.${key}`, 'must be an object');
    }
    return undefined;
  }
}

/** Validate a pipeline document and apply defaults. */
export function validatePipelineDefinition(input: unknown): DefinitionValidationResult {
  const issues = new Issues();

  if (!isRecord(input)) {
    issues.error('VALIDATION.SCHEMA', 'pipeline', 'must be a JSON object');
    return { valid: false, errors: issues.errors, warnings: issues.warnings };
  }

  const id = issues.string(input, 'id', 'pipeline');
  if (id && !NAME_PATTERN.test(id)) {
    issues.error('VALIDATION.INVALID_NAME', 'pipeline.id', `"${id}" must match ${NAME_PATTERN.source}`);
  }
  const name = issues.optionalString(input, 'name', 'pipeline') ?? id;
  const sourceRepository = issues.string(input, 'sourceRepository', 'pipeline');
  const branches = issues.stringArray(input, 'branches', 'pipeline');
  const credentials = readCredentials(input, issues);
  const stages = readStages(input, issues);

  if (stages.length > 0) {
    validateStageOrder(stages, issues);
    validateSecretScopes(stages, credentials, issues);
  }

  if (issues.errors.length > 0 || !id || !name || !sourceRepository) {
    return { valid: false, errors: issues.errors, warnings: issues.warnings };
  }

  return {
    valid: true,
    errors: [],
    warnings: issues.warnings,
    pipeline: { id, name, sourceRepository, branches, credentials, stages },
  };
}

function readCredentials(input: JsonObject, issues: Issues): CredentialDeclaration[] {
  const raw = input.credentials;
  if (raw === undefined) return [];
  if (!Array.isArray(raw)) {
    issues.error('VALIDATION.INVALID_TYPE', 'pipeline.credentials', 'must be an array');
    return [];
  }

  const declarations: CredentialDeclaration[] = [];
  const seen = new Set<string>();
  raw.forEach((entry: unknown, index) => {
    const path = `pipeline.credentials[${index}]`;
    if (!isRecord(entry)) {
      issues.error('VALIDATION.INVALID_TYPE', path, 'must be an object');
      return;
    }
    const name = issues.string(entry, 'name', path);
    const kindValue = entry.kind ?? 'SecureString';
    let kind: CredentialKind = 'SecureString';
    if (isOneOf(CREDENTIAL_KINDS, kindValue)) {
      kind = kindValue;
    } else {
      issues.error('VALIDATION.INVALID_VALUE', `${path}.kind`, `must be one of ${CREDENTIAL_KINDS.join(', ')}`);
    }
    const allowedStages = issues.stringArray(entry, 'allowedStages', path) ?? [];
    if (!name) return;
    if (seen.has(name)) {
      issues.error('VALIDATION.DUPLICATE_CREDENTIAL', `${path}.name`, `credential "${name}" is declared twice`);
      return;
    }
    seen.add(name);
    declarations.push({ name, kind, allowedStages });
  });
  return declarations;
}

function readStages(input: JsonObject, issues: Issues): StageSpec[] {
  const raw = input.stages;
  if (!Array.isArray(raw) || raw.length === 0) {
    issues.error('VALIDATION.EMPTY_STAGES', 'pipeline.stages', 'must be a non-empty array');
    return [];
  }

  const stages: StageSpec[] = [];
  const names = new Set<string>();
  raw.forEach((entry: unknown, index) => {
    const path = `pipeline.stages[${index}]`;
    const stage = readStage(entry, path, issues);
    if (!stage) return;
    if (names.has(stage.name)) {
      issues.error('VALIDATION.DUPLICATE_STAGE', `${path}.name`, `stage name "${stage.name}" is used twice`);
      return;
    }
    names.add(stage.name);
    stages.push(stage);
  });
  return stages;
}

function readStage(entry: unknown, path: string, issues: Issues): StageSpec | undefined {
  if (!isRecord(entry)) {
    issues.error('VALIDATION.INVALID_TYPE', path, 'must be an object');
    return undefined;
  }

  const name = issues.string(entry, 'name', path);
  if (name && !NAME_PATTERN.test(name)) {
    issues.error('VALIDATION.INVALID_NAME', `${path}.name`, `"${name}" must match ${NAME_PATTERN.source}`);
  }
  const stagePath = name ? `stage "${name}"` : path;

  const actionRaw = issues.object(entry, 'action', stagePath);
  const action = actionRaw ? readAction(actionRaw, `${stagePath}.action`, issues) : undefined;
  if (!name || !action) return undefined;

  const environment =
    entry.environment === undefined
      ? DEFAULT_ENVIRONMENTS[action.kind]()
      : readEnvironment(entry.environment, `${stagePath}.environment`, issues);
  const secretScopes = issues.stringArray(entry, 'secretScopes', stagePath) ?? [];
  const retry = readRetry(entry.retry, action.kind, `${stagePath}.retry`, issues);
  if (!environment || !retry) return undefined;

  return { name, environment, action, secretScopes, retry };
}

function readAction(raw: JsonObject, path: string, issues: Issues): StageAction | undefined {
  const kind = raw.kind;
  if (!isOneOf(Object.values(StageActionKind), kind)) {
    issues.error('VALIDATION.INVALID_ACTION', `${path}.kind`, `must be one of ${ACTION_KINDS.join(', ')}`);
    return undefined;
  }

  switch (kind) {
    case StageActionKind.Build: {
      const repository = issues.string(raw, 'repository', path);
      const contextDir = issues.optionalString(raw, 'contextDir', path) ?? DEFAULT_BUILD_CONTEXT;
      const dockerfile = issues.optionalString(raw, 'dockerfile', path);
      const buildArgs = issues.stringMap(raw, 'buildArgs', path);
      if (!repository) return undefined;
      return { kind, repository, contextDir, dockerfile, buildArgs };
    }

    case StageActionKind.Publish: {
      const registryUrl = issues.string(raw, 'registryUrl', path);
      const usernameSecret = issues.string(raw, 'usernameSecret', path);
      const passwordSecret = issues.string(raw, 'passwordSecret', path);
      const tags = issues.stringArray(raw, 'tags', path) ?? [...DEFAULT_PUBLISH_TAGS];
      if (tags.length === 0) {
        issues.error('VALIDATION.EMPTY_TAGS', `${path}.tags`, 'must list at least one tag');
      }
      if (!registryUrl || !usernameSecret || !passwordSecret) return undefined;
      return { kind, registryUrl, usernameSecret, passwordSecret, tags };
    }

    case StageActionKind.Trigger: {
      const targetRaw = issues.object(raw, 'target', path);
      const target = targetRaw ? readTarget(targetRaw, `${path}.target`, issues) : undefined;
      const credentialEnv = issues.stringMap(raw, 'credentialEnv', path);
      for (const variable of Object.keys(credentialEnv ?? {})) {
        if (!ENV_VAR_PATTERN.test(variable)) {
          issues.error('VALIDATION.INVALID_NAME', `${path}.credentialEnv`, `"${variable}" is not a valid variable name`);
        }
      }
      if (!target) return undefined;
      return { kind, target, credentialEnv };
    }
  }
}

function readTarget(raw: JsonObject, path: string, issues: Issues): DeploymentTarget | undefined {
  const cluster = issues.string(raw, 'cluster', path);
  const service = issues.string(raw, 'service', path);
  const region = issues.string(raw, 'region', path);
  const repository = issues.string(raw, 'repository', path);
  const selection = raw.imageSelection ?? 'latest';
  let imageSelection: ImageSelection = 'latest';
  if (isOneOf(IMAGE_SELECTIONS, selection)) {
    imageSelection = selection;
  } else {
    issues.error('VALIDATION.INVALID_VALUE', `${path}.imageSelection`, `must be one of ${IMAGE_SELECTIONS.join(', ')}`);
  }
  if (!cluster || !service || !region || !repository) return undefined;
  return { cluster, service, region, repository, imageSelection };
}

function readEnvironment(raw: unknown, path: string, issues: Issues): EnvironmentSpec | undefined {
  if (!isRecord(raw)) {
    issues.error('VALIDATION.INVALID_TYPE', path, 'must be an object');
    return undefined;
  }
  const image = issues.string(raw, 'image', path);
  const workingDir = issues.optionalString(raw, 'workingDir', path);
  const entrypointOverride = issues.stringArray(raw, 'entrypointOverride', path);

  const mounts: MountRequest[] = [];
  const mountsRaw = raw.mounts ?? [];
  if (!Array.isArray(mountsRaw)) {
    issues.error('VALIDATION.INVALID_TYPE', `${path}.mounts`, 'must be an array');
  } else {
    mountsRaw.forEach((m: unknown, index) => {
      const mountPath = `${path}.mounts[${index}]`;
      if (!isRecord(m)) {
        issues.error('VALIDATION.INVALID_TYPE', mountPath, 'must be an object');
        return;
      }
      const hostPath = issues.string(m, 'hostPath', mountPath);
      const containerPath = issues.string(m, 'containerPath', mountPath);
      for (const [key, value] of [['hostPath', hostPath], ['containerPath', containerPath]] as const) {
        if (value && !value.startsWith('/')) {
          issues.error('VALIDATION.INVALID_MOUNT', `${mountPath}.${key}`, 'must be an absolute path');
        }
      }
      if (m.readOnly !== undefined && typeof m.readOnly !== 'boolean') {
        issues.error('VALIDATION.INVALID_TYPE', `${mountPath}.readOnly`, 'must be a boolean');
      }
      if (hostPath && containerPath) {
        mounts.push({ hostPath, containerPath, readOnly: m.readOnly === true ? true : undefined });
      }
    });
  }

  const capabilities: EnvironmentCapability[] = [];
  for (const capability of issues.stringArray(raw, 'capabilities', path) ?? []) {
    if (isOneOf(Object.values(EnvironmentCapability), capability)) {
      capabilities.push(capability);
    } else {
      issues.error('VALIDATION.UNKNOWN_CAPABILITY', `${path}.capabilities`, `unknown capability "${capability}"`, [
        { type: 'USE_CAPABILITY', params: { validCapabilities: [...CAPABILITIES] } },
      ]);
    }
  }

  if (!image) return undefined;
  return { image, workingDir, mounts, capabilities, entrypointOverride };
}

function readRetry(raw: unknown, kind: StageActionKind, path: string, issues: Issues): RetryPolicy | undefined {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICIES[kind] };
  if (raw === undefined) return policy;
  if (!isRecord(raw)) {
    issues.error('VALIDATION.INVALID_TYPE', path, 'must be an object');
    return undefined;
  }

  const fields: JsonObject = raw;
  const number = (key: keyof RetryPolicy): number | undefined => {
    const value = fields[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      issues.error('VALIDATION.INVALID_TYPE', `${path}.${key}`, 'must be a finite number');
      return undefined;
    }
    return value;
  };

  const maxAttempts = number('maxAttempts');
  if (maxAttempts !== undefined) {
    if (!Number.isInteger(maxAttempts) || maxAttempts < RETRY_LIMITS.minAttempts || maxAttempts > RETRY_LIMITS.maxAttempts) {
      issues.error(
        'VALIDATION.INVALID_ATTEMPTS',
        `${path}.maxAttempts`,
        `must be an integer between ${RETRY_LIMITS.minAttempts} and ${RETRY_LIMITS.maxAttempts}`,
      );
    } else if (kind === StageActionKind.Build && maxAttempts > 1) {
      issues.warn(`${path}.maxAttempts`, 'build stages are never retried; using 1');
    } else {
      policy.maxAttempts = maxAttempts;
    }
  }

  const timeoutMs = number('timeoutMs');
  if (timeoutMs !== undefined) {
    if (timeoutMs <= 0) {
      issues.error('VALIDATION.INVALID_TIMEOUT', `${path}.timeoutMs`, 'must be greater than 0');
    } else {
      policy.timeoutMs = timeoutMs;
    }
  }

  const backoffBaseMs = number('backoffBaseMs');
  if (backoffBaseMs !== undefined) {
    if (backoffBaseMs < 0) {
      issues.error('VALIDATION.INVALID_BACKOFF', `${path}.backoffBaseMs`, 'must not be negative');
    } else {
      policy.backoffBaseMs = backoffBaseMs;
      policy.backoffMaxMs = Math.max(policy.backoffMaxMs, backoffBaseMs);
    }
  }

  const backoffMaxMs = number('backoffMaxMs');
  if (backoffMaxMs !== undefined) {
    if (backoffMaxMs < policy.backoffBaseMs) {
      issues.error('VALIDATION.INVALID_BACKOFF', `${path}.backoffMaxMs`, 'must not be less than backoffBaseMs');
    } else {
      policy.backoffMaxMs = backoffMaxMs;
    }
  }

  if (raw.backoffStrategy !== undefined) {
    if (isOneOf(BACKOFF_STRATEGIES, raw.backoffStrategy)) {
      policy.backoffStrategy = raw.backoffStrategy;
    } else {
      issues.error('VALIDATION.INVALID_VALUE', `${path}.backoffStrategy`, `must be one of ${BACKOFF_STRATEGIES.join(', ')}`);
    }
  }

  if (raw.retryProvisioning !== undefined) {
    if (typeof raw.retryProvisioning === 'boolean') {
      policy.retryProvisioning = raw.retryProvisioning;
    } else {
      issues.error('VALIDATION.INVALID_TYPE', `${path}.retryProvisioning`, 'must be a boolean');
    }
  }

  return policy;
}

/** Build before publish, publish before a trigger that depends on its tags. */
function validateStageOrder(stages: StageSpec[], issues: Issues): void {
  let buildSeen = false;
  const publishedTags: string[][] = [];

  for (const stage of stages) {
    const path = `stage "${stage.name}"`;
    const { action } = stage;

    switch (action.kind) {
      case StageActionKind.Build:
        if (buildSeen) {
          issues.error('VALIDATION.MULTIPLE_BUILDS', path, 'a pipeline may have at most one build stage');
        }
        buildSeen = true;
        break;

      case StageActionKind.Publish:
        if (!buildSeen) {
          issues.error('VALIDATION.STAGE_ORDER', path, 'a publish stage must come after a build stage');
        }
        publishedTags.push(action.tags);
        break;

      case StageActionKind.Trigger: {
        if (publishedTags.length === 0) {
          issues.warn(path, 'no earlier publish stage; the deployment will use whatever the registry holds');
          break;
        }
        const required = action.target.imageSelection === 'version' ? '{runNumber}' : 'latest';
        if (!publishedTags.some((tags) => tags.includes(required))) {
          issues.error(
            'VALIDATION.STAGE_ORDER',
            path,
            `imageSelection "${action.target.imageSelection}" needs an earlier publish stage that pushes "${required}"`,
          );
        }
        break;
      }
    }
  }
}

/** Every scope is declared and allowed; every secret a stage reads is in its scopes. */
function validateSecretScopes(stages: StageSpec[], credentials: CredentialDeclaration[], issues: Issues): void {
  const stageNames = new Set(stages.map((s) => s.name));
  for (const credential of credentials) {
    for (const allowed of credential.allowedStages) {
      if (!stageNames.has(allowed)) {
        issues.warn(`credential "${credential.name}"`, `allowedStages names unknown stage "${allowed}"`);
      }
    }
  }

  for (const stage of stages) {
    const path = `stage "${stage.name}".secretScopes`;
    for (const scope of stage.secretScopes) {
      const declaration = credentials.find((c) => c.name === scope);
      if (!declaration) {
        issues.error('VALIDATION.SECRET_SCOPE', path, `credential "${scope}" is not declared`, [
          { type: 'DECLARE_CREDENTIAL', params: { name: scope, allowedStages: [stage.name] } },
        ]);
      } else if (!declaration.allowedStages.includes(stage.name)) {
        issues.error('VALIDATION.SECRET_SCOPE', path, `credential "${scope}" is not allowed for this stage`, [
          { type: 'ALLOW_STAGE', params: { credential: scope, stage: stage.name } },
        ]);
      }
    }

    const referenced: string[] = [];
    if (stage.action.kind === StageActionKind.Publish) {
      referenced.push(stage.action.usernameSecret, stage.action.passwordSecret);
    } else if (stage.action.kind === StageActionKind.Trigger) {
      referenced.push(...Object.values(stage.action.credentialEnv ?? {}));
    }
    for (const name of referenced) {
      if (!stage.secretScopes.includes(name)) {
        issues.error('VALIDATION.SECRET_SCOPE', `stage "${stage.name}".action`, `reads "${name}" which is not in its secretScopes`, [
          { type: 'ADD_SCOPE', params: { stage: stage.name, credential: name } },
        ]);
      }
    }
  }
}

/**
 * Process configuration.
 *
 * Read once at startup from the environment. Invalid values fail fast with
 * a ConfigError naming the variable.
 */

import { TypedError, createTypedError } from './domain/errors';
import { EnvironmentCapability } from './domain/stage';
import { LogLevel, parseLogLevel } from './logger';

export type Backend = 'docker' | 'memory';

const BACKENDS: readonly Backend[] = ['docker', 'memory'];

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  /** docker: Docker CLI, env secrets, AWS CLI. memory: in-process stand-ins. */
  backend: Backend;
  pipelineFile?: string;
  /** Shared secret for push webhooks. Verification is off when unset. */
  webhookSecret?: string;
  supersedeRuns: boolean;
  dockerPath: string;
  secretPrefix: string;
  privilegedHostPaths: Record<string, EnvironmentCapability>;
}

export class ConfigError extends Error {
  public readonly typedError: TypedError;

  constructor(variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigError';
    this.typedError = createTypedError({
      code: 'CONFIG.INVALID',
      message: this.message,
      retryable: false,
      details: { variable },
    });
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseBoolean(variable: string, value: string | undefined, fallback: boolean): boolean {
  const normalized = nonEmpty(value)?.toLowerCase();
  if (normalized === undefined) return fallback;
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigError(variable, `expected a boolean, got "${value}"`);
}

/** Load and validate configuration. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const portValue = nonEmpty(env.PORT) ?? '5000';
  const port = Number(portValue);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError('PORT', `expected a port number, got "${portValue}"`);
  }

  const levelValue = nonEmpty(env.SHIPYARD_LOG_LEVEL) ?? LogLevel.Info;
  const logLevel = parseLogLevel(levelValue);
  if (!logLevel) {
    throw new ConfigError('SHIPYARD_LOG_LEVEL', `expected one of ${Object.values(LogLevel).join(', ')}, got "${levelValue}"`);
  }

  const backendValue = nonEmpty(env.SHIPYARD_BACKEND)?.toLowerCase() ?? 'docker';
  const backend = BACKENDS.find((b) => b === backendValue);
  if (!backend) {
    throw new ConfigError('SHIPYARD_BACKEND', `expected one of ${BACKENDS.join(', ')}, got "${backendValue}"`);
  }

  const privilegedHostPaths: Record<string, EnvironmentCapability> = {};
  const pathsValue = env.SHIPYARD_PRIVILEGED_HOST_PATHS ?? '/var/run/docker.sock';
  for (const hostPath of pathsValue.split(',').map((p) => p.trim()).filter(Boolean)) {
    if (!hostPath.startsWith('/')) {
      throw new ConfigError('SHIPYARD_PRIVILEGED_HOST_PATHS', `"${hostPath}" is not an absolute path`);
    }
    privilegedHostPaths[hostPath] = EnvironmentCapability.ContainerRuntimeSocket;
  }

  return {
    port,
    logLevel,
    backend,
    pipelineFile: nonEmpty(env.SHIPYARD_PIPELINE_FILE),
    webhookSecret: nonEmpty(env.SHIPYARD_WEBHOOK_SECRET),
    supersedeRuns: parseBoolean('SHIPYARD_SUPERSEDE_RUNS', env.SHIPYARD_SUPERSEDE_RUNS, true),
    dockerPath: nonEmpty(env.SHIPYARD_DOCKER_PATH) ?? 'docker',
    secretPrefix: nonEmpty(env.SHIPYARD_SECRET_PREFIX) ?? 'SHIPYARD_SECRET_',
    privilegedHostPaths,
  };
}

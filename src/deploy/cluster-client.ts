/**
 * Cluster boundary.
 *
 * `updateService(request)` asks the container service to converge on an
 * image and returns as soon as the request is accepted. The AWS CLI client
 * runs inside the trigger stage's environment with the stage's credentials
 * in its process environment.
 */

import { parseImageRef } from '../domain/artifact';
import { DeploymentAck, DeploymentRequest } from '../domain/deployment';
import { EnvironmentHandle } from '../environment/provisioner';
import { v4 as uuidv4 } from 'uuid';

export interface ClusterClient {
  updateService(request: DeploymentRequest): Promise<DeploymentAck>;
}

export type ClusterClientErrorReason = 'unauthorized' | 'not-found' | 'throttled' | 'unavailable';

export class ClusterClientError extends Error {
  constructor(
    message: string,
    public readonly reason: ClusterClientErrorReason,
  ) {
    super(message);
    this.name = 'ClusterClientError';
  }
}

export interface ClusterClientContext {
  /** Variables for the client process (credentials). */
  env: Record<string, string>;
  signal?: AbortSignal;
}

export type ClusterClientFactory = (environment: EnvironmentHandle, context: ClusterClientContext) => ClusterClient;

const UNAUTHORIZED_PATTERN =
  /AccessDenied|UnrecognizedClient|InvalidClientTokenId|ExpiredToken|Unable to locate credentials|not authorized/i;
const NOT_FOUND_PATTERN = /ServiceNotFoundException|ClusterNotFoundException|ServiceNotActiveException/;
const THROTTLED_PATTERN = /Throttling|TooManyRequests|Rate exceeded/i;

/** Classify an AWS CLI failure from its stderr. */
export function classifyClusterFailure(stderr: string): ClusterClientErrorReason {
  if (UNAUTHORIZED_PATTERN.test(stderr)) return 'unauthorized';
  if (NOT_FOUND_PATTERN.test(stderr)) return 'not-found';
  if (THROTTLED_PATTERN.test(stderr)) return 'throttled';
  return 'unavailable';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function asRecord(value: unknown, what: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ClusterClientError(`Unexpected response shape: ${what}`, 'unavailable');
  }
  return value;
}

// Fields of describe-task-definition output accepted by register-task-definition.
const REGISTERABLE_FIELDS = [
  'family',
  'taskRoleArn',
  'executionRoleArn',
  'networkMode',
  'containerDefinitions',
  'volumes',
  'placementConstraints',
  'requiresCompatibilities',
  'cpu',
  'memory',
  'runtimePlatform',
  'ephemeralStorage',
  'proxyConfiguration',
  'pidMode',
  'ipcMode',
];

/**
 * ECS through the AWS CLI.
 *
 * `latest` targets force a new deployment of the current task definition,
 * so the service re-pulls the floating tag. `version` targets pin the run's
 * tag into a new task definition revision (reusing the current one when the
 * image is already pinned) and point the service at it.
 */
export class AwsCliClusterClient implements ClusterClient {
  constructor(
    private readonly environment: EnvironmentHandle,
    private readonly context: ClusterClientContext,
    private readonly awsPath: string = 'aws',
  ) {}

  async updateService(request: DeploymentRequest): Promise<DeploymentAck> {
    const { target } = request;
    const base = ['--cluster', target.cluster, '--service', target.service, '--region', target.region];

    let output: Record<string, unknown>;
    if (target.imageSelection === 'latest') {
      output = await this.aws(['ecs', 'update-service', ...base, '--force-new-deployment']);
    } else {
      const taskDefinitionArn = await this.pinTaskDefinition(request);
      output = await this.aws(['ecs', 'update-service', ...base, '--task-definition', taskDefinitionArn]);
    }

    return {
      deploymentId: primaryDeploymentId(output) ?? uuidv4(),
      cluster: target.cluster,
      service: target.service,
      region: target.region,
      imageRef: request.imageRef,
      digest: request.expectedDigest,
      status: 'enqueued',
      requestedAt: new Date().toISOString(),
    };
  }

  private async pinTaskDefinition(request: DeploymentRequest): Promise<string> {
    const { target } = request;
    const described = await this.aws([
      'ecs',
      'describe-services',
      '--cluster',
      target.cluster,
      '--services',
      target.service,
      '--region',
      target.region,
    ]);
    const services = Array.isArray(described.services) ? described.services.filter(isRecord) : [];
    const service = services[0];
    if (!service || typeof service.taskDefinition !== 'string') {
      throw new ClusterClientError(`Service ${target.service} not found in cluster ${target.cluster}`, 'not-found');
    }

    const current = asRecord(
      (await this.aws(['ecs', 'describe-task-definition', '--task-definition', service.taskDefinition, '--region', target.region]))
        .taskDefinition,
      'describe-task-definition',
    );
    const containers = Array.isArray(current.containerDefinitions) ? current.containerDefinitions.filter(isRecord) : [];
    const matching = containers.filter(
      (c) => typeof c.image === 'string' && parseImageRef(c.image).repository === target.repository,
    );
    if (matching.length === 0) {
      throw new ClusterClientError(
        `No container of ${service.taskDefinition} runs an image from ${target.repository}`,
        'not-found',
      );
    }
    if (matching.every((c) => c.image === request.imageRef)) {
      return service.taskDefinition;
    }

    const input: Record<string, unknown> = {};
    for (const field of REGISTERABLE_FIELDS) {
      if (current[field] !== undefined) input[field] = current[field];
    }
    input.containerDefinitions = containers.map((c) =>
      matching.includes(c) ? { ...c, image: request.imageRef } : c,
    );

    const registered = asRecord(
      (await this.aws(['ecs', 'register-task-definition', '--region', target.region, '--cli-input-json', JSON.stringify(input)]))
        .taskDefinition,
      'register-task-definition',
    );
    if (typeof registered.taskDefinitionArn !== 'string') {
      throw new ClusterClientError('register-task-definition returned no taskDefinitionArn', 'unavailable');
    }
    return registered.taskDefinitionArn;
  }

  private async aws(args: string[]): Promise<Record<string, unknown>> {
    const result = await this.environment.exec([this.awsPath, ...args, '--output', 'json'], {
      env: this.context.env,
      signal: this.context.signal,
    });
    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      throw new ClusterClientError(stderr || `aws ${args[1]} exited with ${result.exitCode}`, classifyClusterFailure(stderr));
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(result.stdout);
    } catch (err) {
      throw new ClusterClientError(
        `aws ${args[1]} returned invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
        'unavailable',
      );
    }
    return asRecord(parsed, `aws ${args[1]}`);
  }
}

function primaryDeploymentId(output: Record<string, unknown>): string | undefined {
  const service = isRecord(output.service) ? output.service : undefined;
  const deployments = service && Array.isArray(service.deployments) ? service.deployments.filter(isRecord) : [];
  const primary = deployments.find((d) => d.status === 'PRIMARY') ?? deployments[0];
  return primary && typeof primary.id === 'string' ? primary.id : undefined;
}

export function awsCliClusterClientFactory(awsPath = 'aws'): ClusterClientFactory {
  return (environment, context) => new AwsCliClusterClient(environment, context, awsPath);
}

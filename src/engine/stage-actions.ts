/**
 * Stage actions: what each kind of stage does inside its environment.
 *
 * Build produces the artifact, publish pushes it, trigger asks the cluster
 * to converge. Each action reads only what earlier stages handed forward.
 */

import { ArtifactBuilder } from '../artifact/builder';
import { AccessDeniedError, PublishError } from '../domain/errors';
import { shortCommit } from '../domain/source';
import { StageActionKind, renderTags } from '../domain/stage';
import { DeploymentTrigger, resolveDeploymentRequest } from '../deploy/trigger';
import { RegistryPublisher } from '../registry/publisher';
import { StageActionContext, StageActionExecutor, StageOutput } from './stage-runner';

export class DefaultStageActions implements StageActionExecutor {
  constructor(
    private readonly builder: ArtifactBuilder,
    private readonly publisher: RegistryPublisher,
    private readonly trigger: DeploymentTrigger,
  ) {}

  async execute(ctx: StageActionContext): Promise<StageOutput> {
    const { action } = ctx.stage;

    switch (action.kind) {
      case StageActionKind.Build: {
        const artifact = await this.builder.build(
          ctx.environment,
          ctx.source,
          { repository: action.repository, runNumber: ctx.runNumber },
          {
            contextDir: action.contextDir,
            dockerfile: action.dockerfile,
            buildArgs: action.buildArgs,
            signal: ctx.signal,
            onOutput: (line) => ctx.log(line),
          },
        );
        ctx.log(`Built ${artifact.repository}:${artifact.tag} (${artifact.digest})`);
        return { artifact };
      }

      case StageActionKind.Publish: {
        if (!ctx.artifact) {
          throw new PublishError('PUBLISH.MISSING_ARTIFACT', 'No artifact was built before this publish stage', {
            stageName: ctx.stage.name,
            retryable: false,
          });
        }
        const tags = renderTags(action.tags, {
          runNumber: ctx.runNumber,
          shortCommit: shortCommit(ctx.source.commit),
        });
        const publication = await this.publisher.publish(ctx.environment, {
          registryUrl: action.registryUrl,
          artifact: ctx.artifact,
          tags,
          credentials: {
            username: requireSecret(ctx, action.usernameSecret),
            password: requireSecret(ctx, action.passwordSecret),
          },
          signal: ctx.signal,
          onOutput: (line) => ctx.log(line),
        });
        return { publication };
      }

      case StageActionKind.Trigger: {
        const request = resolveDeploymentRequest(action.target, ctx.artifact, ctx.publication, ctx.stage.name);
        const env: Record<string, string> = {};
        for (const [variable, secretName] of Object.entries(action.credentialEnv ?? {})) {
          env[variable] = requireSecret(ctx, secretName);
        }
        ctx.log(`Requesting ${action.target.service} in ${action.target.cluster} to run ${request.imageRef}`);
        const deployment = await this.trigger.trigger(ctx.environment, request, env, ctx.signal);
        ctx.log(`Deployment ${deployment.deploymentId} enqueued`);
        return { deployment };
      }
    }
  }
}

function requireSecret(ctx: StageActionContext, name: string): string {
  const value = ctx.secrets[name];
  if (value === undefined) {
    throw new AccessDeniedError(`Credential "${name}" is not in the secret scopes of stage "${ctx.stage.name}"`, {
      stageName: ctx.stage.name,
      details: { credential: name },
    });
  }
  return value;
}

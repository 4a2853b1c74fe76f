/**
 * Pipeline definition model.
 */

import { CredentialDeclaration } from './credential';
import { StageSpec } from './stage';

/** A validated, defaults-applied pipeline. */
export interface PipelineDefinition {
  id: string;
  name: string;
  /** Source repository pushes are matched against. */
  sourceRepository: string;
  /** Branches that trigger runs. Empty or absent means every branch. */
  branches?: string[];
  credentials: CredentialDeclaration[];
  stages: StageSpec[];
}

/** Whether a push to `branch` should start a run of this pipeline. */
export function pipelineAcceptsBranch(pipeline: PipelineDefinition, branch: string): boolean {
  return !pipeline.branches || pipeline.branches.length === 0 || pipeline.branches.includes(branch);
}

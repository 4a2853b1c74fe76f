/**
 * Pipeline file loader.
 *
 * A pipeline file holds one definition or `{ "pipelines": [...] }`. The
 * whole file is rejected when any definition in it is invalid.
 */

import { readFile } from 'fs/promises';
import { TypedError } from '../domain/errors';
import { PipelineDefinition } from '../domain/pipeline';
import { validatePipelineDefinition } from './validator';

export class PipelineDefinitionError extends Error {
  constructor(
    message: string,
    public readonly errors: TypedError[],
  ) {
    super(message);
    this.name = 'PipelineDefinitionError';
  }
}

export interface LoadedPipelines {
  pipelines: PipelineDefinition[];
  warnings: string[];
}

/** Validate every definition in a parsed pipeline document. */
export function parsePipelineDocument(document: unknown, origin = 'pipeline document'): LoadedPipelines {
  const entries =
    document !== null && typeof document === 'object' && !Array.isArray(document) && 'pipelines' in document
      ? document.pipelines
      : [document];
  if (!Array.isArray(entries)) {
    throw new PipelineDefinitionError(`${origin}: "pipelines" must be an array`, []);
  }

  const pipelines: PipelineDefinition[] = [];
  const warnings: string[] = [];
  const errors: TypedError[] = [];
  const ids = new Set<string>();

  entries.forEach((entry: unknown, index) => {
    const result = validatePipelineDefinition(entry);
    const label = result.pipeline?.id ?? `#${index}`;
    warnings.push(...result.warnings.map((w) => `${label}: ${w}`));
    if (!result.pipeline) {
      errors.push(...result.errors.map((e) => ({ ...e, message: `${label}: ${e.message}` })));
      return;
    }
    if (ids.has(result.pipeline.id)) {
      errors.push({
        code: 'VALIDATION.DUPLICATE_PIPELINE',
        message: `${label}: pipeline id is used twice`,
        retryable: false,
        suggestedFixes: [],
      });
      return;
    }
    ids.add(result.pipeline.id);
    pipelines.push(result.pipeline);
  });

  if (errors.length > 0) {
    throw new PipelineDefinitionError(
      `${origin} has ${errors.length} error(s): ${errors.map((e) => e.message).join('; ')}`,
      errors,
    );
  }
  return { pipelines, warnings };
}

/** Read and validate a JSON pipeline file. */
export async function loadPipelineFile(path: string): Promise<LoadedPipelines> {
  const text = await readFile(path, 'utf8');
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw new PipelineDefinitionError(
      `${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      [],
    );
  }
  return parsePipelineDocument(document, path);
}

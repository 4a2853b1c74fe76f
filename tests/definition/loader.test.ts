/**
 * Pipeline file loader tests.
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PipelineDefinitionError, loadPipelineFile, parsePipelineDocument } from '../../src/definition/loader';
import { pipelineDocument } from '../fixtures';

describe('parsePipelineDocument', () => {
  it('accepts a single definition', () => {
    const loaded = parsePipelineDocument(pipelineDocument());

    expect(loaded.pipelines.map((p) => p.id)).toEqual(['web']);
    expect(loaded.warnings).toEqual([]);
  });

  it('accepts a list of definitions', () => {
    const loaded = parsePipelineDocument({
      pipelines: [pipelineDocument(), { ...pipelineDocument(), id: 'web-canary', branches: ['canary'] }],
    });

    expect(loaded.pipelines.map((p) => p.id)).toEqual(['web', 'web-canary']);
  });

  it('rejects the whole document when one definition is invalid', () => {
    let caught: unknown;
    try {
      parsePipelineDocument({ pipelines: [pipelineDocument(), { ...pipelineDocument(), id: 'bad id' }] });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(PipelineDefinitionError);
    if (caught instanceof PipelineDefinitionError) {
      expect(caught.errors.map((e) => e.code)).toEqual(['VALIDATION.INVALID_NAME']);
      expect(caught.errors[0].message).toBe('#1: pipeline.id: "bad id" must match ^[A-Za-z0-9][A-Za-z0-9_-]*$');
    }
  });

  it('rejects duplicate pipeline ids', () => {
    expect(() => parsePipelineDocument({ pipelines: [pipelineDocument(), pipelineDocument()] })).toThrow(
      'pipeline document has 1 error(s): web: pipeline id is used twice',
    );
  });

  it('rejects a non-array pipelines field', () => {
    expect(() => parsePipelineDocument({ pipelines: 'web' }, 'pipelines.json')).toThrow(
      'pipelines.json: "pipelines" must be an array',
    );
  });

  it('prefixes warnings with the pipeline id', () => {
    const document = {
      ...pipelineDocument(),
      credentials: [
        { name: 'registry/username', allowedStages: ['publish'] },
        { name: 'registry/password', allowedStages: ['publish'] },
        { name: 'deploy/secret-key', allowedStages: ['deploy'] },
        { name: 'unused', allowedStages: ['lint'] },
      ],
    };

    expect(parsePipelineDocument(document).warnings).toEqual([
      'web: credential "unused": allowedStages names unknown stage "lint"',
    ]);
  });
});

describe('loadPipelineFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pipelines-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads and validates a JSON file', async () => {
    const path = join(dir, 'pipelines.json');
    await writeFile(path, JSON.stringify({ pipelines: [pipelineDocument()] }));

    const loaded = await loadPipelineFile(path);

    expect(loaded.pipelines.map((p) => p.id)).toEqual(['web']);
  });

  it('the bundled sample pipeline is valid', async () => {
    const loaded = await loadPipelineFile(join(__dirname, '..', '..', 'pipelines', 'web-service.json'));

    expect(loaded.pipelines.map((p) => p.stages.map((s) => s.name))).toEqual([['build', 'publish', 'deploy']]);
    expect(loaded.warnings).toEqual([]);
  });

  it('reports invalid JSON with the file path', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ "pipelines": [');

    await expect(loadPipelineFile(path)).rejects.toThrow(`${path} is not valid JSON: `);
  });
});

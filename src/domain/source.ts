/**
 * Source references and push events.
 *
 * A run is always built from one commit of one branch. Push payloads from
 * GitHub, GitLab, or a plain `{repo, branch, commit}` body are normalized
 * into a SourceRef.
 */

/** The commit a run builds. */
export interface SourceRef {
  /** Source repository identifier, e.g. "acme/web" or a clone URL. */
  repository: string;
  branch: string;
  commit: string;
}

const ZERO_SHA = /^0+$/;
const BRANCH_REF_PREFIX = 'refs/heads/';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function stringField(obj: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = obj?.[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/** Extract the repository identifier from a push payload. */
export function repositoryFromPayload(body: Record<string, unknown>): string | undefined {
  const direct = stringField(body, 'repo');
  if (direct) return direct;

  // GitHub: repository.full_name (owner/repo) or repository.clone_url
  const repo = isRecord(body.repository) ? body.repository : undefined;
  const fromRepo = stringField(repo, 'full_name') ?? stringField(repo, 'clone_url');
  if (fromRepo) return fromRepo;

  // GitLab: project.path_with_namespace or project.web_url
  const project = isRecord(body.project) ? body.project : undefined;
  return stringField(project, 'path_with_namespace') ?? stringField(project, 'web_url');
}

/** Outcome of parsing a push payload. */
export type PushParseResult =
  | { kind: 'source'; source: SourceRef }
  | { kind: 'ignored'; reason: string }
  | { kind: 'invalid'; reason: string };

/**
 * Normalize a push payload.
 *
 * Branch deletions and tag pushes are ignored rather than rejected so the
 * webhook sender does not retry them.
 */
export function parsePushEvent(body: unknown): PushParseResult {
  if (!isRecord(body)) {
    return { kind: 'invalid', reason: 'Push payload must be a JSON object' };
  }

  const repository = repositoryFromPayload(body);
  if (!repository) {
    return {
      kind: 'invalid',
      reason: 'Missing repo. Send repo, repository.full_name, repository.clone_url, or project.path_with_namespace',
    };
  }

  if (body.deleted === true) {
    return { kind: 'ignored', reason: 'branch deleted' };
  }

  const ref = stringField(body, 'ref');
  let branch = stringField(body, 'branch');
  if (!branch && ref) {
    if (!ref.startsWith(BRANCH_REF_PREFIX)) {
      return { kind: 'ignored', reason: `not a branch push: ${ref}` };
    }
    branch = ref.slice(BRANCH_REF_PREFIX.length);
  }
  if (!branch) {
    return { kind: 'invalid', reason: 'Missing branch or ref' };
  }

  const commit =
    stringField(body, 'commit') ?? stringField(body, 'checkout_sha') ?? stringField(body, 'after');
  if (!commit) {
    return { kind: 'invalid', reason: 'Missing commit (commit, checkout_sha, or after)' };
  }
  if (ZERO_SHA.test(commit)) {
    return { kind: 'ignored', reason: 'branch deleted' };
  }

  return { kind: 'source', source: { repository, branch, commit } };
}

/** First 7 characters of a commit SHA. */
export function shortCommit(commit: string): string {
  return commit.slice(0, 7);
}

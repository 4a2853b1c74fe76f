/**
 * Artifact model.
 *
 * An artifact is the image the build stage produces. Its identity is the
 * content digest; tags are pointers. The run-number tag is immutable by
 * convention, `latest` moves with every publish and is never used to
 * decide correctness.
 */

import { SourceRef } from './source';

export const LATEST_TAG = 'latest';

/** A built image. Frozen once produced. */
export interface Artifact {
  readonly repository: string;
  /** Version tag (the run number). */
  readonly tag: string;
  /** Content digest, "sha256:<64 hex>". */
  readonly digest: string;
  readonly runNumber: number;
  readonly source: Readonly<SourceRef>;
  readonly builtAt: string;
}

/** One tag pushed to the registry. */
export interface PublishedTag {
  tag: string;
  imageRef: string;
  digest: string;
  pushedAt: string;
}

/** Acknowledgement of a completed publish. */
export interface PublishAck {
  registryUrl: string;
  /** Registry digest every published tag resolves to. */
  digest: string;
  tags: PublishedTag[];
}

const DIGEST_PATTERN = /^sha256:[a-f0-9]{64}$/;

export function isDigest(value: string): boolean {
  return DIGEST_PATTERN.test(value);
}

export function imageRef(repository: string, tag: string): string {
  return `${repository}:${tag}`;
}

/**
 * Split "host:5000/team/app:42" into repository and tag. The tag separator
 * is the last colon after the last slash, so registry ports survive.
 */
export function parseImageRef(ref: string): { repository: string; tag: string } {
  const slash = ref.lastIndexOf('/');
  const colon = ref.lastIndexOf(':');
  if (colon > slash) {
    return { repository: ref.slice(0, colon), tag: ref.slice(colon + 1) };
  }
  return { repository: ref, tag: LATEST_TAG };
}

/** Create the immutable artifact record. */
export function createArtifact(params: {
  repository: string;
  runNumber: number;
  digest: string;
  source: SourceRef;
  builtAt?: string;
}): Artifact {
  return Object.freeze({
    repository: params.repository,
    tag: String(params.runNumber),
    digest: params.digest,
    runNumber: params.runNumber,
    source: Object.freeze({ ...params.source }),
    builtAt: params.builtAt ?? new Date().toISOString(),
  });
}

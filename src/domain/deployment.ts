/**
 * Deployment target model.
 *
 * The trigger stage asks a container service to replace its running
 * instances. Which image the service ends up on is an explicit choice:
 * `latest` follows the floating tag, `version` pins the run's own tag.
 */

export type ImageSelection = 'latest' | 'version';

export const IMAGE_SELECTIONS: readonly ImageSelection[] = ['latest', 'version'];

/** The service a pipeline deploys to. Static for the lifetime of a run. */
export interface DeploymentTarget {
  cluster: string;
  service: string;
  region: string;
  /** Image repository the service runs from. */
  repository: string;
  imageSelection: ImageSelection;
}

/** A convergence request sent to the cluster. */
export interface DeploymentRequest {
  target: DeploymentTarget;
  /** Image the service should converge to, e.g. "repo:latest" or "repo:42". */
  imageRef: string;
  /** Digest the caller expects `imageRef` to resolve to, when known. */
  expectedDigest?: string;
}

/** Acknowledgement that convergence was enqueued (not completed). */
export interface DeploymentAck {
  deploymentId: string;
  cluster: string;
  service: string;
  region: string;
  imageRef: string;
  digest?: string;
  status: 'enqueued';
  requestedAt: string;
}

/**
 * Errors raised by the persistence layer.
 */

/**
 * Run not found error
 */
export class RunNotFoundError extends Error {
  constructor(public readonly runId: string) {
    super(`Run not found: ${runId}`);
    this.name = 'RunNotFoundError';
  }
}

/**
 * Thrown when the exclusive lock on a run cannot be acquired in time.
 */
export class LockTimeoutError extends Error {
  constructor(
    public readonly runId: string,
    public readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for the lock on run ${runId}`);
    this.name = 'LockTimeoutError';
  }
}

/**
 * Thrown when a deployment name is already taken.
 */
export class DeploymentConflictError extends Error {
  constructor(public readonly deploymentName: string) {
    super(`Deployment already exists: ${deploymentName}`);
    this.name = 'DeploymentConflictError';
  }
}

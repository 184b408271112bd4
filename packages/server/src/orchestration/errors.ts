/**
 * Operational failure of a transition attempt.
 *
 * Raised when a rule or the store throws while a transition is being
 * evaluated or committed. Policy decisions are never reported this way.
 */
export class OrchestrationFailedError extends Error {
  constructor(
    public readonly runId: string,
    cause: unknown
  ) {
    super(
      `Transition for run ${runId} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'OrchestrationFailedError';
  }
}

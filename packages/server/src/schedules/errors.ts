/**
 * Thrown when a schedule definition cannot produce occurrences.
 */
export class InvalidScheduleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvalidScheduleError';
  }
}

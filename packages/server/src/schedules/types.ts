/**
 * Bounds for generating schedule occurrences.
 */
export interface ScheduleWindow {
  /** Occurrences are strictly after this instant */
  start: Date;
  /** Occurrences are at or before this instant */
  end: Date;
  /** Maximum number of occurrences */
  limit: number;
}

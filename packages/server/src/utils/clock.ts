/**
 * Source of the current time, injected so services and rules can be tested
 * against a fixed instant.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Injection token for the wall clock.
 * Token expiry and ledger timestamps read time through it so tests can pin "now".
 */
export const CLOCK = Symbol('CLOCK');

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};

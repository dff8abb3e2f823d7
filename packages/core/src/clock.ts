/**
 * Clock — time source for logTime(). Injected so tests stay deterministic.
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** A clock frozen at `at`. */
export function fixedClock(at: Date | string): Clock {
  const ms = new Date(at).getTime();
  return {
    now: () => new Date(ms),
  };
}

export const CLOCK = Symbol('CLOCK');

/** Unix time in whole seconds. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

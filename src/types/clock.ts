/**
 * Injectable time source so expiry, leases and deadlines can be tested.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

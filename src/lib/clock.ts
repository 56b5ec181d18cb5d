/** Milliseconds since the epoch. Injected so caches and quotas can run on a fake clock. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

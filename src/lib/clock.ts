/** Time source for everything that waits. Tests swap in a manual clock. */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, Math.max(0, ms))),
};

export function toEpochSeconds(ms: number): number {
  return Math.floor(ms / 1000);
}

export type Clock = {
  sleep(ms: number): Promise<void>;
  /** Uniform in [0, 1). */
  random(): number;
};

export const systemClock: Clock = {
  sleep: (ms) => new Promise((r) => setTimeout(r, ms)),
  random: () => Math.random(),
};

export function jitter(clock: Clock, maxMs: number): number {
  return maxMs > 0 ? Math.floor(clock.random() * maxMs) : 0;
}

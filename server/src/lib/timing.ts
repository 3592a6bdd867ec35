export type Sleep = (ms: number) => Promise<void>;
export type RandomSource = () => number;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** Uniform delay in [minMs, maxMs], rounded to whole milliseconds. */
export function jitter(minMs: number, maxMs: number, random: RandomSource = Math.random): number {
  if (maxMs <= minMs) return minMs;
  return Math.round(minMs + (maxMs - minMs) * random());
}

import { setTimeout as wait } from "node:timers/promises";

export type RandomSource = () => number;

/** Suspends the calling flow; rejects with the signal's abort error once the signal fires. */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleeper = async (ms, signal) => {
  await wait(Math.max(0, Math.round(ms)), undefined, { signal });
};

export function randomBetween(min: number, max: number, random: RandomSource = Math.random): number {
  if (min >= max) {
    return min;
  }
  return min + random() * (max - min);
}

export function randomInt(min: number, max: number, random: RandomSource = Math.random): number {
  return Math.floor(randomBetween(min, max + 1, random));
}

export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

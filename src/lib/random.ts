import crypto from "node:crypto";

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

// mulberry32
export function createSeededRandom(seed: number): RandomSource {
  let state = Math.trunc(seed) >>> 0;

  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandom(seed?: number | null) {
  if (seed === undefined || seed === null) {
    return createSeededRandom(crypto.randomBytes(4).readUInt32LE(0));
  }
  return createSeededRandom(seed);
}

export function randomIndex(random: RandomSource, length: number) {
  return Math.min(Math.floor(random() * length), length - 1);
}

/** Fisher-Yates on a copy. */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i -= 1) {
    const j = randomIndex(random, i + 1);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/** Picks `count` items without replacement, in draw order. */
export function sample<T>(items: readonly T[], count: number, random: RandomSource): T[] {
  const pool = [...items];
  const size = Math.max(0, Math.min(count, pool.length));

  for (let i = 0; i < size; i += 1) {
    const j = i + randomIndex(random, pool.length - i);
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }

  return pool.slice(0, size);
}

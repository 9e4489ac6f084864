/**
 * Source of uniform numbers in [0, 1). Transitions take one of these instead
 * of calling Math.random directly.
 */
export interface RandomSource {
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/** mulberry32; same seed, same sequence. */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next() {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/** Replays the given values in order, then repeats the last one. */
export function sequenceRandom(values: number[]): RandomSource {
  if (values.length === 0) throw new Error("sequenceRandom needs at least one value");
  for (const v of values) {
    if (v < 0 || v >= 1) throw new Error(`sequenceRandom value out of range: ${v}`);
  }
  let i = 0;
  return {
    next() {
      const value = values[Math.min(i, values.length - 1)];
      i++;
      return value;
    },
  };
}

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(rng: RandomSource, min: number, max: number): number {
  return min + Math.floor(rng.next() * (max - min + 1));
}

export function chance(rng: RandomSource, probability: number): boolean {
  return rng.next() < probability;
}

/**
 * Pluggable randomness for synthetic market data.
 * Production uses Math.random; tests pass a seeded source so generated
 * comparables are reproducible.
 */
export interface RandomSource {
  /** Float in [0, 1) */
  next(): number;
}

export const defaultRandom: RandomSource = {
  next: () => Math.random()
};

// mulberry32
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next() {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }
  };
}

// Replays a fixed sequence, cycling when exhausted
export function createSequenceRandom(values: number[]): RandomSource {
  if (values.length === 0) {
    throw new Error('createSequenceRandom needs at least one value');
  }
  let index = 0;
  return {
    next() {
      const value = values[index % values.length];
      index++;
      return value;
    }
  };
}

export function uniform(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random.next();
}

/** Integer in [min, max], both inclusive */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random.next() * (max - min + 1));
}

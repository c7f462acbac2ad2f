// ============================================================================
// SeededRNG.ts — Random sources threaded through generation and resolution
// ============================================================================

/**
 * Anything that yields uniform values in [0, 1). Generation and movement
 * resolution take one of these explicitly so a test can script the rolls.
 */
export interface RandomSource {
  next(): number;
}

// ---------------------------------------------------------------------------
// Implementations
// ---------------------------------------------------------------------------

/** Linear congruential generator; the same seed always replays the same rolls. */
export class SeededRNG implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Advance the state and return a value in [0, 1). */
  next(): number {
    this.state = ((this.state * 1664525 + 1013904223) & 0xFFFFFFFF) >>> 0;
    return this.state / 0x100000000;
  }
}

export class MathRandomSource implements RandomSource {
  next(): number {
    return Math.random();
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Return an integer in [min, max] (inclusive). */
export function randomInt(rng: RandomSource, min: number, max: number): number {
  return Math.floor(rng.next() * (max - min + 1)) + min;
}

/** Pick a random element from a non-empty array. */
export function pick<T>(rng: RandomSource, arr: readonly T[]): T {
  return arr[randomInt(rng, 0, arr.length - 1)];
}

/** Shuffle an array in-place (Fisher-Yates). */
export function shuffle<T>(rng: RandomSource, arr: T[]): T[] {
  for (let i = arr.length - 1; i > 0; i--) {
    const j = randomInt(rng, 0, i);
    const tmp = arr[i];
    arr[i] = arr[j];
    arr[j] = tmp;
  }
  return arr;
}

/** `true` with probability `chance`. */
export function roll(rng: RandomSource, chance: number): boolean {
  return rng.next() < chance;
}

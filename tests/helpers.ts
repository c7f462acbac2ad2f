import type { RandomSource } from '@/dungeon/SeededRNG';

/**
 * Hands out the given rolls in order, then keeps returning `fallback`.
 * 0.5 as a fallback means "no valuables, no dodge".
 */
export class ScriptedRandom implements RandomSource {
  private readonly _values: number[];
  private readonly _fallback: number;

  constructor(values: number[] = [], fallback = 0.5) {
    this._values = [...values];
    this._fallback = fallback;
  }

  push(...values: number[]): void {
    this._values.push(...values);
  }

  next(): number {
    return this._values.shift() ?? this._fallback;
  }
}

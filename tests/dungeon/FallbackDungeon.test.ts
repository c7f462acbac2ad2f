import { describe, it, expect } from 'vitest';
import { CellKind } from '@/dungeon/CellKind';
import { buildFallbackDungeon } from '@/dungeon/FallbackDungeon';
import { isBorder } from '@/dungeon/Grid';
import { SeededRNG } from '@/dungeon/SeededRNG';

describe('buildFallbackDungeon', () => {
  it('uses the fixed start, exit and treasure positions', () => {
    const layout = buildFallbackDungeon(25, 12, new SeededRNG(3));
    expect(layout.start).toEqual({ x: 2, y: 2 });
    expect(layout.exit).toEqual({ x: 23, y: 10 });
    expect(layout.treasure).toEqual({ x: 12, y: 6 });
    expect(layout.grid[2][2]).toBe(CellKind.EMPTY);
    expect(layout.grid[10][23]).toBe(CellKind.EXIT);
    expect(layout.grid[6][12]).toBe(CellKind.TREASURE);
  });

  it('seals the border for many seeds and the smallest size', () => {
    for (let seed = 0; seed < 30; seed++) {
      const { grid } = buildFallbackDungeon(7, 7, new SeededRNG(seed));
      for (let y = 0; y < 7; y++) {
        for (let x = 0; x < 7; x++) {
          if (isBorder({ width: 7, height: 7 }, x, y)) expect(grid[y][x]).toBe(CellKind.WALL);
        }
      }
    }
  });

  it('never puts a hazard on the start', () => {
    for (let seed = 0; seed < 30; seed++) {
      const layout = buildFallbackDungeon(7, 7, new SeededRNG(seed));
      expect(layout.grid[2][2]).toBe(CellKind.EMPTY);
      expect(layout.traps.length).toBeLessThanOrEqual(3);
      expect(layout.monsters.length).toBeLessThanOrEqual(2);
    }
  });
});

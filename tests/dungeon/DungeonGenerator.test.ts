import { describe, it, expect } from 'vitest';
import { CellKind } from '@/dungeon/CellKind';
import {
  DungeonGenerationError,
  DungeonGenerator,
  minExitDistance,
} from '@/dungeon/DungeonGenerator';
import { findCells, gridToText, isBorder, manhattan } from '@/dungeon/Grid';
import { SeededRNG } from '@/dungeon/SeededRNG';

const WIDTH = 25;
const HEIGHT = 12;
const SEEDS = Array.from({ length: 40 }, (_, i) => i + 1);

function generate(seed: number, width = WIDTH, height = HEIGHT) {
  return new DungeonGenerator().generate(width, height, new SeededRNG(seed));
}

describe('DungeonGenerator', () => {
  it('produces a grid of the requested size', () => {
    const { grid } = generate(7);
    expect(grid.length).toBe(HEIGHT);
    for (const row of grid) expect(row.length).toBe(WIDTH);
  });

  it('keeps every border cell a wall', () => {
    for (const seed of SEEDS) {
      const { grid } = generate(seed);
      for (let y = 0; y < HEIGHT; y++) {
        for (let x = 0; x < WIDTH; x++) {
          if (isBorder({ width: WIDTH, height: HEIGHT }, x, y)) {
            expect(grid[y][x]).toBe(CellKind.WALL);
          }
        }
      }
    }
  });

  it('places exactly one exit and one treasure where it says', () => {
    for (const seed of SEEDS) {
      const layout = generate(seed);
      expect(findCells(layout.grid, CellKind.EXIT)).toEqual([layout.exit]);
      expect(findCells(layout.grid, CellKind.TREASURE)).toEqual([layout.treasure]);
    }
  });

  it('starts the player on an empty interior cell', () => {
    for (const seed of SEEDS) {
      const { grid, start } = generate(seed);
      expect(grid[start.y][start.x]).toBe(CellKind.EMPTY);
      expect(isBorder({ width: WIDTH, height: HEIGHT }, start.x, start.y)).toBe(false);
    }
  });

  it('opens up the cells around the start', () => {
    for (const seed of SEEDS) {
      const { grid, start } = generate(seed);
      for (let dy = -1; dy <= 1; dy++) {
        for (let dx = -1; dx <= 1; dx++) {
          const x = start.x + dx;
          const y = start.y + dy;
          if (isBorder({ width: WIDTH, height: HEIGHT }, x, y)) continue;
          expect(grid[y][x]).not.toBe(CellKind.WALL);
        }
      }
    }
  });

  it('keeps the exit far enough from the start', () => {
    const minDistance = minExitDistance(WIDTH, HEIGHT);
    expect(minDistance).toBe(7);
    for (const seed of SEEDS) {
      const { start, exit } = generate(seed);
      expect(manhattan(start, exit)).toBeGreaterThanOrEqual(minDistance);
    }
  });

  it('keeps traps and monsters away from the start', () => {
    for (const seed of SEEDS) {
      const { grid, start, traps, monsters } = generate(seed);
      expect(findCells(grid, CellKind.TRAP).length).toBe(traps.length);
      expect(findCells(grid, CellKind.MONSTER).length).toBe(monsters.length);
      for (const trap of traps) expect(manhattan(trap, start)).toBeGreaterThan(3);
      for (const monster of monsters) expect(manhattan(monster, start)).toBeGreaterThan(4);
    }
  });

  it('is deterministic for a given seed', () => {
    const a = generate(1234);
    const b = generate(1234);
    expect(gridToText(a.grid)).toBe(gridToText(b.grid));
    expect(a.start).toEqual(b.start);
    expect(a.exit).toEqual(b.exit);
  });

  it('varies between seeds', () => {
    const layouts = new Set(SEEDS.slice(0, 5).map((seed) => gridToText(generate(seed).grid)));
    expect(layouts.size).toBeGreaterThan(1);
  });

  it('rejects grids smaller than 5x5', () => {
    expect(() => generate(1, 4, 12)).toThrow(DungeonGenerationError);
    expect(() => generate(1, 25, 3)).toThrow('Dungeon must be at least 5x5, got 25x3');
  });

  it('rejects non-integer dimensions', () => {
    expect(() => generate(1, 10.5, 10)).toThrow(DungeonGenerationError);
  });
});

describe('minExitDistance', () => {
  it('never drops below 5', () => {
    expect(minExitDistance(7, 7)).toBe(5);
    expect(minExitDistance(40, 20)).toBe(12);
  });
});

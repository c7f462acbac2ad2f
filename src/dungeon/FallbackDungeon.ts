import { CellKind } from './CellKind';
import { type Grid, type Position, createGrid, findCells, sealBorder } from './Grid';
import type { DungeonLayout } from './DungeonGenerator';
import { type RandomSource, randomInt } from './SeededRNG';

/** Smallest dimensions the fallback layout is built for. */
export const FALLBACK_MIN_SIZE = 7;

const FALLBACK_START: Position = { x: 2, y: 2 };
const FALLBACK_TRAP_ATTEMPTS = 3;
const FALLBACK_MONSTER_ATTEMPTS = 2;

/**
 * Fixed open layout used once random generation has failed too often:
 * an open floor sprinkled with pillars, the start in the top-left, the exit
 * in the bottom-right corner and the treasure in the middle.
 *
 * Does not throw for dimensions of at least {@link FALLBACK_MIN_SIZE}.
 */
export function buildFallbackDungeon(width: number, height: number, rng: RandomSource): DungeonLayout {
  const grid = createGrid(width, height, CellKind.EMPTY);
  sealBorder(grid);

  const pillars = Math.floor((width * height) / 10);
  for (let i = 0; i < pillars; i++) {
    const x = randomInt(rng, 1, width - 2);
    const y = randomInt(rng, 1, height - 2);
    grid[y][x] = CellKind.WALL;
  }

  const start = { ...FALLBACK_START };
  const exit = { x: width - 2, y: height - 2 };
  const treasure = { x: Math.floor(width / 2), y: Math.floor(height / 2) };
  grid[start.y][start.x] = CellKind.EMPTY;
  grid[exit.y][exit.x] = CellKind.EXIT;
  grid[treasure.y][treasure.x] = CellKind.TREASURE;

  scatter(grid, rng, CellKind.TRAP, FALLBACK_TRAP_ATTEMPTS, start);
  scatter(grid, rng, CellKind.MONSTER, FALLBACK_MONSTER_ATTEMPTS, start);

  return {
    grid,
    start,
    exit,
    treasure,
    traps: findCells(grid, CellKind.TRAP),
    monsters: findCells(grid, CellKind.MONSTER),
  };
}

function scatter(
  grid: Grid,
  rng: RandomSource,
  kind: CellKind,
  attempts: number,
  start: Position,
): void {
  const width = grid[0].length;
  const height = grid.length;
  for (let i = 0; i < attempts; i++) {
    const x = randomInt(rng, 3, width - 3);
    const y = randomInt(rng, 3, height - 3);
    if (grid[y][x] === CellKind.EMPTY && !(x === start.x && y === start.y)) {
      grid[y][x] = kind;
    }
  }
}

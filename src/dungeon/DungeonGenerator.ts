// ============================================================================
// DungeonGenerator.ts — Procedural room-and-corridor dungeon generator
// Carves random rooms and straight corridors out of solid rock, then places
// the start, exit, treasure, traps and monsters from a shuffled pool of floor
// cells. Deterministic for a seeded random source.
// ============================================================================

import { CellKind } from './CellKind';
import {
  type CoordKey,
  type Grid,
  type GridBounds,
  type Position,
  coordKey,
  createGrid,
  isInterior,
  manhattan,
  samePosition,
  sealBorder,
} from './Grid';
import { type RandomSource, pick, randomInt, shuffle } from './SeededRNG';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface DungeonLayout {
  grid: Grid;
  start: Position;
  exit: Position;
  treasure: Position;
  traps: Position[];
  monsters: Position[];
}

/** Anything that can produce a layout; the turn engine retries through this. */
export interface DungeonBuilder {
  generate(width: number, height: number, rng: RandomSource): DungeonLayout;
}

export class DungeonGenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DungeonGenerationError';
  }
}

// ---------------------------------------------------------------------------
// Tuning
// ---------------------------------------------------------------------------

/** Smallest grid that still has an interior to carve. */
export const MIN_DUNGEON_SIZE = 5;

const ROOM_DENSITY = 0.01;
const ROOM_MIN_SIZE = 3;
const ROOM_MAX_SIZE = 5;
const CORRIDOR_MIN_LENGTH = 3;
const CORRIDOR_MAX_LENGTH = 8;
const TREASURE_SAMPLES = 10;
const TREASURE_IDEAL_DISTANCE = 3;
const TRAP_RATIO = 0.05;
const MIN_TRAPS = 3;
const TRAP_SAFE_DISTANCE = 3;
const MONSTER_RATIO = 0.03;
const MIN_MONSTERS = 2;
const MONSTER_SAFE_DISTANCE = 4;

const DIRECTIONS: readonly Position[] = [
  { x: 0, y: 1 },
  { x: 1, y: 0 },
  { x: 0, y: -1 },
  { x: -1, y: 0 },
];

/** Minimum Manhattan distance between start and a non-forced exit. */
export function minExitDistance(width: number, height: number): number {
  return Math.max(5, Math.floor((width + height) / 5));
}

// ---------------------------------------------------------------------------
// Candidate pool
// ---------------------------------------------------------------------------

/**
 * Floor cells still free for placement. Removal swaps the last entry into
 * the hole, so sampling without replacement is O(1).
 */
class CandidatePool {
  private readonly _cells: Position[] = [];
  private readonly _keys: Set<CoordKey> = new Set();

  get size(): number {
    return this._cells.length;
  }

  at(index: number): Position {
    return this._cells[index];
  }

  has(pos: Position): boolean {
    return this._keys.has(coordKey(pos.x, pos.y));
  }

  add(pos: Position): void {
    const key = coordKey(pos.x, pos.y);
    if (this._keys.has(key)) return;
    this._keys.add(key);
    this._cells.push(pos);
  }

  removeAt(index: number): Position {
    const cell = this._cells[index];
    const last = this._cells.pop();
    if (last !== undefined && index < this._cells.length) {
      this._cells[index] = last;
    }
    this._keys.delete(coordKey(cell.x, cell.y));
    return cell;
  }

  remove(pos: Position): void {
    const index = this._cells.findIndex((c) => samePosition(c, pos));
    if (index >= 0) this.removeAt(index);
  }

  shuffle(rng: RandomSource): void {
    shuffle(rng, this._cells);
  }

  findIndex(predicate: (cell: Position) => boolean): number {
    return this._cells.findIndex(predicate);
  }
}

interface CarveState {
  grid: Grid;
  bounds: GridBounds;
  rng: RandomSource;
  pool: CandidatePool;
}

// ---------------------------------------------------------------------------
// DungeonGenerator
// ---------------------------------------------------------------------------

export class DungeonGenerator implements DungeonBuilder {
  /**
   * Build a new dungeon.
   *
   * @throws DungeonGenerationError when the grid is too small to carve or no
   *   floor cell is left for the treasure.
   */
  generate(width: number, height: number, rng: RandomSource): DungeonLayout {
    if (
      !Number.isInteger(width) ||
      !Number.isInteger(height) ||
      width < MIN_DUNGEON_SIZE ||
      height < MIN_DUNGEON_SIZE
    ) {
      throw new DungeonGenerationError(
        `Dungeon must be at least ${MIN_DUNGEON_SIZE}x${MIN_DUNGEON_SIZE}, got ${width}x${height}`,
      );
    }

    const state: CarveState = {
      grid: createGrid(width, height, CellKind.WALL),
      bounds: { width, height },
      rng,
      pool: new CandidatePool(),
    };

    // 1. Rooms and corridors
    this.carveRooms(state);
    this.carveCorridors(state);

    // 2. Rooms and corridors may have touched the outer ring
    sealBorder(state.grid);

    // 3. Candidate pool of floor cells, shuffled once
    this.collectFloor(state);

    // 4. Key placements
    const start = this.placeStart(state);
    const exit = this.placeExit(state, start);
    const treasure = this.placeTreasure(state, start, exit);

    // 5. Hazards
    const trapCount = Math.max(MIN_TRAPS, Math.round(state.pool.size * TRAP_RATIO));
    const traps = this.placeHazards(state, start, CellKind.TRAP, trapCount, TRAP_SAFE_DISTANCE);
    const monsterCount = Math.max(MIN_MONSTERS, Math.round(state.pool.size * MONSTER_RATIO));
    const monsters = this.placeHazards(
      state,
      start,
      CellKind.MONSTER,
      monsterCount,
      MONSTER_SAFE_DISTANCE,
    );

    return { grid: state.grid, start, exit, treasure, traps, monsters };
  }

  // =========================================================================
  // Carving
  // =========================================================================

  private carveRooms(state: CarveState): void {
    const { grid, bounds, rng } = state;
    const roomCount = Math.ceil(bounds.width * bounds.height * ROOM_DENSITY);

    for (let i = 0; i < roomCount; i++) {
      const cx = randomInt(rng, 2, bounds.width - 3);
      const cy = randomInt(rng, 2, bounds.height - 3);
      const half = Math.floor(randomInt(rng, ROOM_MIN_SIZE, ROOM_MAX_SIZE) / 2);

      for (let y = Math.max(1, cy - half); y <= Math.min(bounds.height - 2, cy + half); y++) {
        for (let x = Math.max(1, cx - half); x <= Math.min(bounds.width - 2, cx + half); x++) {
          grid[y][x] = CellKind.EMPTY;
        }
      }
    }
  }

  private carveCorridors(state: CarveState): void {
    const { grid, bounds, rng } = state;
    const corridorCount = bounds.width + bounds.height;

    for (let i = 0; i < corridorCount; i++) {
      const x0 = randomInt(rng, 1, bounds.width - 2);
      const y0 = randomInt(rng, 1, bounds.height - 2);
      const dir = pick(rng, DIRECTIONS);
      const length = randomInt(rng, CORRIDOR_MIN_LENGTH, CORRIDOR_MAX_LENGTH);

      for (let step = 0; step < length; step++) {
        const x = x0 + dir.x * step;
        const y = y0 + dir.y * step;
        if (isInterior(bounds, x, y)) {
          grid[y][x] = CellKind.EMPTY;
        }
      }
    }
  }

  private collectFloor(state: CarveState): void {
    const { grid, bounds, pool } = state;
    for (let y = 1; y < bounds.height - 1; y++) {
      for (let x = 1; x < bounds.width - 1; x++) {
        if (grid[y][x] === CellKind.EMPTY) pool.add({ x, y });
      }
    }
    pool.shuffle(state.rng);
  }

  /** Knock out interior walls within `radius` of a point; new floor joins the pool. */
  private clearAround(state: CarveState, center: Position, radius: number, keep?: Position): void {
    const { grid, bounds, pool } = state;
    for (let dy = -radius; dy <= radius; dy++) {
      for (let dx = -radius; dx <= radius; dx++) {
        const x = center.x + dx;
        const y = center.y + dy;
        if (!isInterior(bounds, x, y) || grid[y][x] !== CellKind.WALL) continue;
        grid[y][x] = CellKind.EMPTY;
        const cell = { x, y };
        if (!keep || !samePosition(cell, keep)) pool.add(cell);
      }
    }
  }

  // =========================================================================
  // Placement
  // =========================================================================

  private placeStart(state: CarveState): Position {
    const { grid, bounds, pool } = state;

    let start: Position;
    if (pool.size > 0) {
      start = pool.removeAt(0);
    } else {
      start = this.findFloor(grid, bounds) ?? {
        x: Math.floor(bounds.width / 4),
        y: Math.floor(bounds.height / 2),
      };
      grid[start.y][start.x] = CellKind.EMPTY;
    }

    this.clearAround(state, start, 1, start);
    return start;
  }

  private placeExit(state: CarveState, start: Position): Position {
    const { grid, bounds, pool } = state;
    const minDistance = minExitDistance(bounds.width, bounds.height);

    const index = pool.findIndex((cell) => manhattan(cell, start) >= minDistance);
    if (index >= 0) {
      const exit = pool.removeAt(index);
      grid[exit.y][exit.x] = CellKind.EXIT;
      return exit;
    }

    // Nothing far enough: mirror the start across the grid and open it up.
    let exit: Position = {
      x: clamp(bounds.width - start.x - 2, 1, bounds.width - 2),
      y: clamp(bounds.height - start.y - 2, 1, bounds.height - 2),
    };
    if (samePosition(exit, start)) {
      exit = farthestInteriorCorner(bounds, start);
    }

    pool.remove(exit);
    grid[exit.y][exit.x] = CellKind.EXIT;
    this.clearAround(state, exit, 1, start);
    return exit;
  }

  private placeTreasure(state: CarveState, start: Position, exit: Position): Position {
    const { grid, bounds, pool, rng } = state;

    if (pool.size > 0) {
      let bestIndex = -1;
      let bestScore = Number.POSITIVE_INFINITY;

      const samples = Math.min(TREASURE_SAMPLES, pool.size);
      for (let i = 0; i < samples; i++) {
        const index = randomInt(rng, 0, pool.size - 1);
        const cell = pool.at(index);
        const toStart = manhattan(cell, start);
        const toExit = manhattan(cell, exit);
        // Roughly three steps out, and roughly on the way to the exit.
        const score = Math.abs(toStart - TREASURE_IDEAL_DISTANCE) + Math.abs(toExit - toStart);
        if (score < bestScore) {
          bestScore = score;
          bestIndex = index;
        }
      }

      const treasure = pool.removeAt(bestIndex);
      grid[treasure.y][treasure.x] = CellKind.TREASURE;
      return treasure;
    }

    const mid: Position = {
      x: Math.floor((start.x + exit.x) / 2),
      y: Math.floor((start.y + exit.y) / 2),
    };
    const treasure = this.nearestFloor(grid, bounds, mid, start);
    if (!treasure) {
      throw new DungeonGenerationError('No floor left for the treasure');
    }
    grid[treasure.y][treasure.x] = CellKind.TREASURE;
    return treasure;
  }

  private placeHazards(
    state: CarveState,
    start: Position,
    kind: CellKind.TRAP | CellKind.MONSTER,
    count: number,
    safeDistance: number,
  ): Position[] {
    const { grid, pool, rng } = state;
    const placed: Position[] = [];
    const attempts = Math.min(count, pool.size);

    for (let i = 0; i < attempts && pool.size > 0; i++) {
      const index = randomInt(rng, 0, pool.size - 1);
      const cell = pool.at(index);
      if (manhattan(cell, start) <= safeDistance) continue;
      pool.removeAt(index);
      grid[cell.y][cell.x] = kind;
      placed.push(cell);
    }

    return placed;
  }

  // =========================================================================
  // Search helpers
  // =========================================================================

  private findFloor(grid: Grid, bounds: GridBounds): Position | null {
    for (let y = 1; y < bounds.height - 1; y++) {
      for (let x = 1; x < bounds.width - 1; x++) {
        if (grid[y][x] === CellKind.EMPTY) return { x, y };
      }
    }
    return null;
  }

  /** Expanding diamond search for the closest interior floor cell other than `avoid`. */
  private nearestFloor(
    grid: Grid,
    bounds: GridBounds,
    origin: Position,
    avoid: Position,
  ): Position | null {
    const isFree = (x: number, y: number): boolean =>
      isInterior(bounds, x, y) && grid[y][x] === CellKind.EMPTY && !samePosition({ x, y }, avoid);

    if (isFree(origin.x, origin.y)) return origin;

    const maxRadius = Math.max(bounds.width, bounds.height);
    for (let d = 1; d < maxRadius; d++) {
      for (let dy = -d; dy <= d; dy++) {
        for (let dx = -d; dx <= d; dx++) {
          if (Math.abs(dx) + Math.abs(dy) !== d) continue;
          if (isFree(origin.x + dx, origin.y + dy)) {
            return { x: origin.x + dx, y: origin.y + dy };
          }
        }
      }
    }
    return null;
  }
}

// ---------------------------------------------------------------------------
// Utilities
// ---------------------------------------------------------------------------

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function farthestInteriorCorner(bounds: GridBounds, from: Position): Position {
  const corners: Position[] = [
    { x: 1, y: 1 },
    { x: bounds.width - 2, y: 1 },
    { x: 1, y: bounds.height - 2 },
    { x: bounds.width - 2, y: bounds.height - 2 },
  ];
  return corners.reduce((best, c) => (manhattan(c, from) > manhattan(best, from) ? c : best));
}

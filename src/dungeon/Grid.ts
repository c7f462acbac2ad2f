import { CellKind, cellKindFromSymbol } from './CellKind';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A grid coordinate. `x` is the column, `y` the row. */
export interface Position {
  x: number;
  y: number;
}

/** Grid cells indexed `[row][col]`, i.e. `grid[y][x]`. */
export type Grid = CellKind[][];

/** Set key for a coordinate, `"x,y"`. */
export type CoordKey = `${number},${number}`;

export interface GridBounds {
  width: number;
  height: number;
}

export class GridParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GridParseError';
  }
}

// ---------------------------------------------------------------------------
// Coordinates
// ---------------------------------------------------------------------------

export function coordKey(x: number, y: number): CoordKey {
  return `${x},${y}`;
}

export function parseCoordKey(key: CoordKey): Position {
  const [x, y] = key.split(',').map(Number);
  return { x, y };
}

export function manhattan(a: Position, b: Position): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

// ---------------------------------------------------------------------------
// Grid helpers
// ---------------------------------------------------------------------------

export function createGrid(width: number, height: number, fill: CellKind): Grid {
  const grid: Grid = [];
  for (let y = 0; y < height; y++) {
    grid.push(new Array<CellKind>(width).fill(fill));
  }
  return grid;
}

/** Bounds of a rectangular grid. Width is taken from the first row. */
export function gridBounds(grid: ReadonlyArray<ReadonlyArray<CellKind>>): GridBounds {
  return { width: grid.length > 0 ? grid[0].length : 0, height: grid.length };
}

/**
 * Whether a grid has at least one cell and every row has the same length.
 * Movement and visibility treat anything else as malformed.
 */
export function isWellFormed(grid: ReadonlyArray<ReadonlyArray<CellKind>>): boolean {
  if (grid.length === 0 || grid[0].length === 0) return false;
  const width = grid[0].length;
  return grid.every((row) => row.length === width);
}

export function inBounds(bounds: GridBounds, x: number, y: number): boolean {
  return x >= 0 && x < bounds.width && y >= 0 && y < bounds.height;
}

/** Inside the grid and not on the outer ring. */
export function isInterior(bounds: GridBounds, x: number, y: number): boolean {
  return x > 0 && x < bounds.width - 1 && y > 0 && y < bounds.height - 1;
}

export function isBorder(bounds: GridBounds, x: number, y: number): boolean {
  return inBounds(bounds, x, y) && !isInterior(bounds, x, y);
}

/** Overwrite every border cell with WALL. */
export function sealBorder(grid: Grid): void {
  const { width, height } = gridBounds(grid);
  for (let x = 0; x < width; x++) {
    grid[0][x] = CellKind.WALL;
    grid[height - 1][x] = CellKind.WALL;
  }
  for (let y = 0; y < height; y++) {
    grid[y][0] = CellKind.WALL;
    grid[y][width - 1] = CellKind.WALL;
  }
}

/** Every position holding `kind`, row-major. */
export function findCells(grid: Grid, kind: CellKind): Position[] {
  const found: Position[] = [];
  grid.forEach((row, y) => {
    row.forEach((cell, x) => {
      if (cell === kind) found.push({ x, y });
    });
  });
  return found;
}

// ---------------------------------------------------------------------------
// Text layouts
// ---------------------------------------------------------------------------

export function gridToText(grid: Grid): string {
  return grid.map((row) => row.join('')).join('\n');
}

/**
 * Parse a text layout written in the map alphabet. Blank leading/trailing
 * lines and surrounding indentation are ignored; rows must be equal length.
 */
export function parseGrid(text: string): Grid {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  if (lines.length === 0) {
    throw new GridParseError('Layout is empty');
  }

  const width = lines[0].length;
  return lines.map((line, y) => {
    if (line.length !== width) {
      throw new GridParseError(`Row ${y} has length ${line.length}, expected ${width}`);
    }
    return Array.from(line, (symbol, x) => {
      const kind = cellKindFromSymbol(symbol);
      if (kind === undefined) {
        throw new GridParseError(`Unknown symbol "${symbol}" at ${x},${y}`);
      }
      return kind;
    });
  });
}

import type { CellKind } from '@/dungeon/CellKind';
import { type CoordKey, type Position, coordKey, gridBounds, inBounds, isWellFormed } from '@/dungeon/Grid';

/**
 * Cells the player can see from `position`: every in-bounds coordinate within
 * Manhattan distance `radius`. Walls do not block sight.
 *
 * A malformed grid, position or radius degrades to the 3x3 block around the
 * position, limited to cells that exist. Callers accumulate the result into
 * the revealed set themselves.
 */
export function computeVisibleCells(
  position: Position,
  radius: number,
  grid: ReadonlyArray<ReadonlyArray<CellKind>>,
): Set<CoordKey> {
  const validInput =
    isWellFormed(grid) &&
    Number.isInteger(position.x) &&
    Number.isInteger(position.y) &&
    Number.isInteger(radius) &&
    radius >= 0;

  if (!validInput) {
    console.warn(
      `[Visibility] Malformed input at ${position.x},${position.y} (radius ${radius}); showing immediate surroundings.`,
    );
    return immediateSurroundings(position, grid);
  }

  const bounds = gridBounds(grid);
  const visible = new Set<CoordKey>();
  for (let y = Math.max(0, position.y - radius); y <= Math.min(bounds.height - 1, position.y + radius); y++) {
    for (let x = Math.max(0, position.x - radius); x <= Math.min(bounds.width - 1, position.x + radius); x++) {
      if (Math.abs(x - position.x) + Math.abs(y - position.y) <= radius) {
        visible.add(coordKey(x, y));
      }
    }
  }
  return visible;
}

function immediateSurroundings(
  position: Position,
  grid: ReadonlyArray<ReadonlyArray<CellKind>>,
): Set<CoordKey> {
  const visible = new Set<CoordKey>();
  if (!Number.isInteger(position.x) || !Number.isInteger(position.y)) return visible;

  for (let dy = -1; dy <= 1; dy++) {
    for (let dx = -1; dx <= 1; dx++) {
      const x = position.x + dx;
      const y = position.y + dy;
      // Ragged rows: bound each row by its own length.
      if (y >= 0 && y < grid.length && inBounds({ width: grid[y].length, height: grid.length }, x, y)) {
        visible.add(coordKey(x, y));
      }
    }
  }
  return visible;
}

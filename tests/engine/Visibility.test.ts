import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CellKind } from '@/dungeon/CellKind';
import { createGrid, parseGrid } from '@/dungeon/Grid';
import { computeVisibleCells } from '@/engine/Visibility';

describe('computeVisibleCells', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns a full diamond in open space', () => {
    const grid = createGrid(11, 11, CellKind.EMPTY);
    const visible = computeVisibleCells({ x: 5, y: 5 }, 3, grid);
    expect(visible.size).toBe(25);
    expect(visible.has('5,2')).toBe(true);
    expect(visible.has('8,5')).toBe(true);
    expect(visible.has('7,7')).toBe(false);
    expect(visible.has('6,7')).toBe(true);
  });

  it('clips the diamond at the grid edge', () => {
    const grid = createGrid(10, 10, CellKind.EMPTY);
    const visible = computeVisibleCells({ x: 0, y: 0 }, 3, grid);
    expect(visible.size).toBe(10);
  });

  it('sees through walls', () => {
    const grid = parseGrid('#####\n#.#.#\n#####');
    const visible = computeVisibleCells({ x: 1, y: 1 }, 2, grid);
    expect(visible.has('3,1')).toBe(true);
  });

  it('sees only its own cell with radius 0', () => {
    const grid = createGrid(5, 5, CellKind.EMPTY);
    expect([...computeVisibleCells({ x: 2, y: 2 }, 0, grid)]).toEqual(['2,2']);
    expect(console.warn).not.toHaveBeenCalled();
  });

  it('falls back to the 3x3 block for a negative radius', () => {
    const grid = createGrid(5, 5, CellKind.EMPTY);
    const visible = computeVisibleCells({ x: 2, y: 2 }, -1, grid);
    expect(visible.size).toBe(9);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('limits the fallback block to cells that exist on ragged rows', () => {
    const grid = [
      [CellKind.WALL, CellKind.WALL, CellKind.WALL],
      [CellKind.WALL, CellKind.EMPTY],
      [CellKind.WALL, CellKind.WALL, CellKind.WALL],
    ];
    const visible = computeVisibleCells({ x: 1, y: 1 }, 3, grid);
    expect([...visible].sort()).toEqual(['0,0', '0,1', '0,2', '1,0', '1,1', '1,2', '2,0', '2,2']);
  });

  it('returns nothing for an empty grid', () => {
    expect(computeVisibleCells({ x: 0, y: 0 }, 3, []).size).toBe(0);
  });

  it('returns nothing for a fractional position', () => {
    const grid = createGrid(5, 5, CellKind.EMPTY);
    expect(computeVisibleCells({ x: 1.5, y: 2 }, 3, grid).size).toBe(0);
  });
});

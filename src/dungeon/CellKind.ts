// ============================================================================
// CellKind.ts — Cell kinds of the dungeon grid and their map symbols
// ============================================================================

/**
 * Semantic type of a grid cell. Enum values are the symbols used when a grid
 * is serialized for the renderer or written as a text layout.
 */
export enum CellKind {
  WALL = '#',
  EMPTY = '.',
  EXIT = 'E',
  TREASURE = '$',
  TRAP = 'T',
  MONSTER = 'M',
}

/** Marker drawn over the player's cell. Never stored in a grid. */
export const PLAYER_SYMBOL = '@';

const KINDS_BY_SYMBOL: ReadonlyMap<string, CellKind> = new Map(
  Object.values(CellKind).map((kind): [string, CellKind] => [kind, kind]),
);

/** Look up the kind for a map symbol, or `undefined` if it is not one. */
export function cellKindFromSymbol(symbol: string): CellKind | undefined {
  return KINDS_BY_SYMBOL.get(symbol);
}

/** Kinds that disappear (become EMPTY) once the player interacts with them. */
export function isSingleUse(kind: CellKind): boolean {
  return kind === CellKind.TREASURE || kind === CellKind.TRAP || kind === CellKind.MONSTER;
}

/** Whether the player may step onto a cell of this kind. */
export function isPassable(kind: CellKind): boolean {
  return kind !== CellKind.WALL;
}

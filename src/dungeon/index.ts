export * from './CellKind';
export * from './Grid';
export * from './SeededRNG';
export * from './DungeonGenerator';
export * from './FallbackDungeon';

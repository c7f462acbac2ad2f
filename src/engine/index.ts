export * from './GameConfig';
export * from './GameState';
export * from './Commands';
export * from './CellResolution';
export * from './Visibility';
export * from './TurnEngine';

import { CellKind } from '@/dungeon/CellKind';
import { type CoordKey, type Grid, type Position, coordKey, parseCoordKey } from '@/dungeon/Grid';
import type { CellEffect } from './CellResolution';

// ---------------------------------------------------------------------------
// Event emitter
// ---------------------------------------------------------------------------

type EventMap = Record<string, unknown[]>;
type Listener<Args extends unknown[]> = (...args: Args) => void;

export class GameStateEmitter<Events extends EventMap> {
  private _listeners: { [K in keyof Events]?: Set<Listener<Events[K]>> } = {};

  on<K extends keyof Events>(event: K, cb: Listener<Events[K]>): void {
    let set = this._listeners[event];
    if (!set) {
      set = new Set();
      this._listeners[event] = set;
    }
    set.add(cb);
  }

  off<K extends keyof Events>(event: K, cb: Listener<Events[K]>): void {
    this._listeners[event]?.delete(cb);
  }

  emit<K extends keyof Events>(event: K, ...args: Events[K]): void {
    const set = this._listeners[event];
    if (!set) return;
    for (const cb of set) {
      cb(...args);
    }
  }

  clear(): void {
    this._listeners = {};
  }
}

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export enum GameOutcome {
  PLAYING = 'playing',
  WON = 'won',
  LOST = 'lost',
}

export interface PlayerState {
  position: Position;
  health: number;
  maxHealth: number;
  hasTreasure: boolean;
  score: number;
  viewDistance: number;
}

/** Read-only view handed to renderers between turns. */
export interface GameSnapshot {
  grid: ReadonlyArray<ReadonlyArray<CellKind>>;
  player: Readonly<PlayerState>;
  revealed: ReadonlyArray<Position>;
  turnCount: number;
  outcome: GameOutcome;
}

/** Why a move left the player where they stood. */
export type BlockReason = 'wall' | 'bounds' | 'unstable';

export interface GameStateEvents extends EventMap {
  frame: [snapshot: GameSnapshot];
  turn: [turnCount: number, score: number];
  damage: [amount: number, health: number];
  effect: [effect: CellEffect, message: string];
  blocked: [reason: BlockReason, message: string];
  help: [];
  outcome: [outcome: GameOutcome, score: number, turnCount: number];
}

export interface GameStateInit {
  grid: Grid;
  start: Position;
  maxHealth: number;
  viewDistance: number;
  startingScore: number;
}

// ---------------------------------------------------------------------------
// GameState
// ---------------------------------------------------------------------------

/**
 * State of one game attempt. Created fresh for every new game and mutated in
 * place by the turn engine; nothing carries over between attempts.
 */
export class GameState {
  public readonly events = new GameStateEmitter<GameStateEvents>();

  private readonly _grid: Grid;
  private readonly _player: PlayerState;
  private readonly _revealed: Set<CoordKey> = new Set();
  private _turnCount = 0;
  private _outcome: GameOutcome = GameOutcome.PLAYING;

  constructor(init: GameStateInit) {
    this._grid = init.grid;
    this._player = {
      position: { ...init.start },
      health: init.maxHealth,
      maxHealth: init.maxHealth,
      hasTreasure: false,
      score: init.startingScore,
      viewDistance: init.viewDistance,
    };
  }

  // ------------------------------------------------------------------
  // Read access
  // ------------------------------------------------------------------

  public get grid(): Grid {
    return this._grid;
  }

  public get player(): Readonly<PlayerState> {
    return this._player;
  }

  public get position(): Readonly<Position> {
    return this._player.position;
  }

  public get turnCount(): number {
    return this._turnCount;
  }

  public get outcome(): GameOutcome {
    return this._outcome;
  }

  public get isOver(): boolean {
    return this._outcome !== GameOutcome.PLAYING;
  }

  public get revealedCount(): number {
    return this._revealed.size;
  }

  public isRevealed(x: number, y: number): boolean {
    return this._revealed.has(coordKey(x, y));
  }

  public cellAt(x: number, y: number): CellKind | undefined {
    return this._grid[y]?.[x];
  }

  // ------------------------------------------------------------------
  // Grid and fog of war
  // ------------------------------------------------------------------

  public setCell(x: number, y: number, kind: CellKind): void {
    this._grid[y][x] = kind;
  }

  /** Add cells to the revealed set. Cells are never hidden again. */
  public reveal(cells: Iterable<CoordKey>): void {
    for (const key of cells) {
      this._revealed.add(key);
    }
  }

  // ------------------------------------------------------------------
  // Player operations
  // ------------------------------------------------------------------

  public moveTo(position: Position): void {
    this._player.position = { x: position.x, y: position.y };
  }

  public damage(amount: number): void {
    this._player.health = Math.max(0, this._player.health - amount);
    this.events.emit('damage', amount, this._player.health);
  }

  public heal(amount: number): void {
    this._player.health = Math.min(this._player.maxHealth, this._player.health + amount);
  }

  public addScore(points: number): void {
    this._player.score += points;
  }

  /** Deduct points without dropping below zero. */
  public deductScore(points: number): void {
    this._player.score = Math.max(0, this._player.score - points);
  }

  public takeTreasure(): void {
    this._player.hasTreasure = true;
  }

  // ------------------------------------------------------------------
  // Turn bookkeeping
  // ------------------------------------------------------------------

  public advanceTurn(): void {
    this._turnCount++;
    this.events.emit('turn', this._turnCount, this._player.score);
  }

  public finish(outcome: GameOutcome.WON | GameOutcome.LOST): void {
    if (this.isOver) return;
    this._outcome = outcome;
    this.events.emit('outcome', outcome, this._player.score, this._turnCount);
  }

  // ------------------------------------------------------------------
  // Snapshot
  // ------------------------------------------------------------------

  public snapshot(): GameSnapshot {
    return {
      grid: this._grid.map((row) => row.slice()),
      player: { ...this._player, position: { ...this._player.position } },
      revealed: Array.from(this._revealed, parseCoordKey),
      turnCount: this._turnCount,
      outcome: this._outcome,
    };
  }
}

// ============================================================================
// TurnEngine.ts — Game lifecycle and per-turn command resolution
// ============================================================================

import { type CellKind, isPassable } from '@/dungeon/CellKind';
import {
  type DungeonBuilder,
  type DungeonLayout,
  DungeonGenerator,
} from '@/dungeon/DungeonGenerator';
import { buildFallbackDungeon } from '@/dungeon/FallbackDungeon';
import { type Position, gridBounds, inBounds, isWellFormed } from '@/dungeon/Grid';
import { MathRandomSource, type RandomSource } from '@/dungeon/SeededRNG';
import { type CellEffect, resolveCell } from './CellResolution';
import { type Command, type CommandSource, MOVE_DELTAS, type MoveCommand, parseCommand } from './Commands';
import { type GameConfig, type GameConfigOverrides, resolveGameConfig } from './GameConfig';
import { type BlockReason, GameOutcome, type GameSnapshot, GameState } from './GameState';
import { computeVisibleCells } from './Visibility';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const WALL_BUMP_MESSAGE = 'You bump into a solid wall.';
export const UNSTABLE_MESSAGE = 'The dungeon seems unstable. Try again.';

export type TurnResult =
  | { kind: 'noop'; reason: 'timeout' | 'unrecognized' | 'game-over' }
  | { kind: 'quit' }
  | { kind: 'help' }
  | { kind: 'blocked'; reason: BlockReason; message: string }
  | {
      kind: 'moved';
      from: Position;
      to: Position;
      cell: CellKind;
      effect: CellEffect;
      message: string;
      outcome: GameOutcome;
    };

export interface GameSummary {
  outcome: GameOutcome;
  score: number;
  turns: number;
  quit: boolean;
}

export interface TurnEngineOptions {
  config?: GameConfigOverrides;
  rng?: RandomSource;
  generator?: DungeonBuilder;
}

// ---------------------------------------------------------------------------
// TurnEngine
// ---------------------------------------------------------------------------

/**
 * Owns one game at a time. `newGame()` builds a dungeon and a fresh
 * {@link GameState}; `applyCommand()` resolves a single command; `run()`
 * loops over a {@link CommandSource} until the game ends or the player quits.
 */
export class TurnEngine {
  public readonly config: GameConfig;

  private readonly _rng: RandomSource;
  private readonly _generator: DungeonBuilder;
  private _state: GameState | null = null;

  constructor(options: TurnEngineOptions = {}) {
    this.config = resolveGameConfig(options.config);
    this._rng = options.rng ?? new MathRandomSource();
    this._generator = options.generator ?? new DungeonGenerator();
  }

  public get state(): GameState {
    if (!this._state) {
      throw new Error('[TurnEngine] No game in progress. Call newGame() first.');
    }
    return this._state;
  }

  // =========================================================================
  // Game lifecycle
  // =========================================================================

  /** Start a new game on a freshly generated dungeon. Never throws. */
  public newGame(): GameState {
    return this.loadLayout(this.buildLayout());
  }

  /** Start a new game on a given layout, replacing any previous state. */
  public loadLayout(layout: Pick<DungeonLayout, 'grid' | 'start'>): GameState {
    this._state?.events.clear();
    this._state = new GameState({
      grid: layout.grid,
      start: layout.start,
      maxHealth: this.config.maxHealth,
      viewDistance: this.config.viewDistance,
      startingScore: this.config.startingScore,
    });
    this.revealAroundPlayer();
    return this._state;
  }

  private buildLayout(): DungeonLayout {
    const { width, height, maxGenerationAttempts } = this.config;

    for (let attempt = 1; attempt <= maxGenerationAttempts; attempt++) {
      try {
        return this._generator.generate(width, height, this._rng);
      } catch (err: unknown) {
        console.warn(
          `[TurnEngine] Dungeon generation failed (attempt ${attempt}/${maxGenerationAttempts}):`,
          err instanceof Error ? err.message : err,
        );
      }
    }

    console.warn('[TurnEngine] Falling back to the fixed dungeon layout.');
    return buildFallbackDungeon(width, height, this._rng);
  }

  // =========================================================================
  // Turn steps
  // =========================================================================

  /** Union the cells currently in view into the revealed set. */
  public revealAroundPlayer(): void {
    const state = this.state;
    state.reveal(computeVisibleCells(state.position, state.player.viewDistance, state.grid));
  }

  /**
   * Resolve one command. `null` means the wait window passed without input.
   * Nothing but a committed move costs a turn.
   */
  public applyCommand(command: Command | null): TurnResult {
    const state = this.state;

    if (command === null) return { kind: 'noop', reason: 'timeout' };
    if (state.isOver) return { kind: 'noop', reason: 'game-over' };

    if (command === 'quit') return { kind: 'quit' };
    if (command === 'help') {
      state.events.emit('help');
      return { kind: 'help' };
    }
    return this.move(command);
  }

  /** Resolve a raw input token. Anything that is not a command is a no-op. */
  public applyToken(raw: string | null): TurnResult {
    if (raw === null) return this.applyCommand(null);
    const command = parseCommand(raw);
    if (command === null) return { kind: 'noop', reason: 'unrecognized' };
    return this.applyCommand(command);
  }

  private move(command: MoveCommand): TurnResult {
    const state = this.state;
    const grid = state.grid;

    if (!isWellFormed(grid)) {
      console.warn('[TurnEngine] Refusing to move on a malformed grid.');
      return this.block('unstable', UNSTABLE_MESSAGE);
    }

    const delta = MOVE_DELTAS[command];
    const from = { ...state.position };
    const to = { x: from.x + delta.x, y: from.y + delta.y };

    if (!inBounds(gridBounds(grid), to.x, to.y)) {
      return this.block('bounds', WALL_BUMP_MESSAGE);
    }
    const cell = grid[to.y][to.x];
    if (!isPassable(cell)) {
      return this.block('wall', WALL_BUMP_MESSAGE);
    }

    // Commit the move, then resolve what was standing there.
    state.moveTo(to);
    const { effect, message, remaining } = resolveCell(
      cell,
      state.player.hasTreasure,
      this._rng,
      this.config.scoring,
    );
    this.applyEffect(effect);
    if (remaining !== cell) state.setCell(to.x, to.y, remaining);
    state.events.emit('effect', effect, message);

    this.settleTurn(effect);
    return { kind: 'moved', from, to, cell, effect, message, outcome: state.outcome };
  }

  /** The player stays put and no turn passes. */
  private block(reason: BlockReason, message: string): TurnResult {
    this.state.events.emit('blocked', reason, message);
    return { kind: 'blocked', reason, message };
  }

  private applyEffect(effect: CellEffect): void {
    const state = this.state;
    switch (effect.type) {
      case 'valuables':
        state.addScore(effect.points);
        break;
      case 'trap':
      case 'monster':
        if (effect.damage > 0) state.damage(effect.damage);
        break;
      case 'treasure':
        state.takeTreasure();
        state.addScore(effect.points);
        break;
      case 'exit':
      case 'none':
        break;
    }
  }

  /**
   * Terminal checks in order: death, then escape with the treasure, then the
   * ordinary per-turn cost. The turn that ends the game pays no turn cost.
   */
  private settleTurn(effect: CellEffect): void {
    const state = this.state;
    const rules = this.config.scoring;

    if (state.player.health <= 0) {
      state.finish(GameOutcome.LOST);
      console.log(`[TurnEngine] Player died. Score ${state.player.score}, turns ${state.turnCount}.`);
      return;
    }

    if (effect.type === 'exit' && effect.unlocked) {
      const healthBonus = state.player.health * rules.healthBonusPerPoint;
      const efficiencyBonus = Math.max(0, rules.efficiencyBonusBase - state.turnCount);
      state.addScore(healthBonus + efficiencyBonus);
      state.finish(GameOutcome.WON);
      console.log(`[TurnEngine] Player escaped. Score ${state.player.score}, turns ${state.turnCount}.`);
      return;
    }

    state.advanceTurn();
    state.deductScore(rules.turnCost);
  }

  // =========================================================================
  // Game loop
  // =========================================================================

  /**
   * Play the current game to the end. Each iteration reveals the view,
   * publishes a `frame` event, waits for one command and resolves it.
   */
  public async run(source: CommandSource): Promise<GameSummary> {
    const state = this.state;

    while (!state.isOver) {
      this.revealAroundPlayer();
      state.events.emit('frame', this.snapshot());

      const command = await source.next(this.config.inputTimeoutMs);
      const result = this.applyCommand(command);
      if (result.kind === 'quit') {
        return this.summarize(true);
      }
    }

    this.revealAroundPlayer();
    state.events.emit('frame', state.snapshot());
    return this.summarize(false);
  }

  public snapshot(): GameSnapshot {
    return this.state.snapshot();
  }

  public summarize(quit: boolean): GameSummary {
    const state = this.state;
    return {
      outcome: state.outcome,
      score: state.player.score,
      turns: state.turnCount,
      quit,
    };
  }
}

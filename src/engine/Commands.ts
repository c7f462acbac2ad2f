import { z } from 'zod';
import type { Position } from '@/dungeon/Grid';

// ------------------------------------------------------------------
// Command tokens
// ------------------------------------------------------------------

export const CommandSchema = z.enum(['up', 'down', 'left', 'right', 'help', 'quit']);

/** A normalized command token, one per turn. */
export type Command = z.infer<typeof CommandSchema>;

export type MoveCommand = Extract<Command, 'up' | 'down' | 'left' | 'right'>;

export const MOVE_DELTAS: Readonly<Record<MoveCommand, Readonly<Position>>> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

/** Normalize raw text to a command token, or `null` if it is not one. */
export function parseCommand(raw: string): Command | null {
  const result = CommandSchema.safeParse(raw.trim().toLowerCase());
  return result.success ? result.data : null;
}

// ------------------------------------------------------------------
// Command sources
// ------------------------------------------------------------------

/**
 * Supplies at most one command per turn. Resolves to `null` when the wait
 * window elapses without input.
 */
export interface CommandSource {
  next(timeoutMs: number): Promise<Command | null>;
}

/**
 * Replays a fixed list of commands. `null` entries stand for an empty wait
 * window; once the list runs out every call yields `quit`.
 */
export class ScriptedCommandSource implements CommandSource {
  private readonly _queue: Array<Command | null>;

  constructor(commands: ReadonlyArray<Command | null>) {
    this._queue = [...commands];
  }

  async next(_timeoutMs: number): Promise<Command | null> {
    if (this._queue.length === 0) return 'quit';
    const command = this._queue.shift();
    return command ?? null;
  }
}

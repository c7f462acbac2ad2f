import type { Command } from '@/engine/Commands';

// ------------------------------------------------------------------
// Types
// ------------------------------------------------------------------

/** A key name as reported by terminal-kit (`'w'`, `'UP'`, `'CTRL_C'`, ...). */
export type KeyName = string;

/** Binding entry: a command can be triggered by any of its bound keys. */
export interface CommandBinding {
  keys: KeyName[];
}

// ------------------------------------------------------------------
// Default bindings
// ------------------------------------------------------------------

export function createDefaultKeyMap(): Map<Command, CommandBinding> {
  const m = new Map<Command, CommandBinding>();

  // Movement
  m.set('up', { keys: ['w', 'UP'] });
  m.set('down', { keys: ['s', 'DOWN'] });
  m.set('left', { keys: ['a', 'LEFT'] });
  m.set('right', { keys: ['d', 'RIGHT'] });

  // Meta
  m.set('help', { keys: ['h'] });
  m.set('quit', { keys: ['q', 'CTRL_C'] });

  return m;
}

// ------------------------------------------------------------------
// KeyBindings
// ------------------------------------------------------------------

/**
 * Maps raw key names to command tokens. Single-letter keys match in either
 * case; named keys (arrows, control chords) match exactly.
 */
export class KeyBindings {
  private readonly _commands: Map<Command, CommandBinding>;

  constructor() {
    this._commands = createDefaultKeyMap();
  }

  /** Command bound to `key`, or `null` for an unbound key. */
  public commandFor(key: KeyName): Command | null {
    const normalized = normalizeKey(key);
    for (const [command, binding] of this._commands) {
      if (binding.keys.some((k) => normalizeKey(k) === normalized)) return command;
    }
    return null;
  }
}

function normalizeKey(key: KeyName): KeyName {
  return key.length === 1 ? key.toLowerCase() : key;
}

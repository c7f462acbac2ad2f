import { describe, it, expect } from 'vitest';
import { MOVE_DELTAS, ScriptedCommandSource, parseCommand } from '@/engine/Commands';

describe('parseCommand', () => {
  it('accepts every command token', () => {
    for (const token of ['up', 'down', 'left', 'right', 'help', 'quit']) {
      expect(parseCommand(token)).toBe(token);
    }
  });

  it('ignores case and surrounding whitespace', () => {
    expect(parseCommand('  LEFT\n')).toBe('left');
  });

  it('returns null for anything else', () => {
    expect(parseCommand('jump')).toBeNull();
    expect(parseCommand('')).toBeNull();
    expect(parseCommand('w')).toBeNull();
  });
});

describe('MOVE_DELTAS', () => {
  it('moves up toward row 0', () => {
    expect(MOVE_DELTAS.up).toEqual({ x: 0, y: -1 });
    expect(MOVE_DELTAS.right).toEqual({ x: 1, y: 0 });
  });
});

describe('ScriptedCommandSource', () => {
  it('replays its commands, then quits', async () => {
    const source = new ScriptedCommandSource(['up', null, 'help']);
    expect(await source.next(500)).toBe('up');
    expect(await source.next(500)).toBeNull();
    expect(await source.next(500)).toBe('help');
    expect(await source.next(500)).toBe('quit');
  });
});

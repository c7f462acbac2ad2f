import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { KeyName } from '@/terminal/KeyBindings';
import { type TerminalPort, TerminalFrontend, colorizeMapLine } from '@/terminal/TerminalFrontend';

// ---------------------------------------------------------------------------
// Fake terminal
// ---------------------------------------------------------------------------

interface FakeTerminal {
  port: TerminalPort;
  writes: string[];
  press(key: KeyName): void;
}

function makeFakeTerminal(): FakeTerminal {
  const handlers: Array<(key: KeyName) => void> = [];
  const writes: string[] = [];
  const port: TerminalPort = {
    clear: vi.fn(),
    write: (text) => {
      writes.push(text);
    },
    grabInput: vi.fn(),
    hideCursor: vi.fn(),
    fullscreen: vi.fn(),
    onKey: (handler) => {
      handlers.push(handler);
    },
    removeKeyHandlers: () => {
      handlers.length = 0;
    },
  };
  return {
    port,
    writes,
    press: (key) => {
      for (const handler of handlers) handler(key);
    },
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('TerminalFrontend', () => {
  let terminal: FakeTerminal;
  let frontend: TerminalFrontend;

  beforeEach(() => {
    vi.useFakeTimers();
    terminal = makeFakeTerminal();
    frontend = new TerminalFrontend(terminal.port);
    frontend.start();
  });

  afterEach(() => {
    frontend.stop();
    vi.useRealTimers();
  });

  it('grabs the terminal on start', () => {
    expect(terminal.port.grabInput).toHaveBeenCalledWith(true);
    expect(terminal.port.fullscreen).toHaveBeenCalledWith(true);
  });

  it('resolves a pending wait as soon as a bound key arrives', async () => {
    const next = frontend.next(500);
    terminal.press('UP');
    await expect(next).resolves.toBe('up');
  });

  it('resolves to null when the wait window passes', async () => {
    const next = frontend.next(500);
    vi.advanceTimersByTime(500);
    await expect(next).resolves.toBeNull();
  });

  it('ignores unbound keys', async () => {
    const next = frontend.next(500);
    terminal.press('x');
    vi.advanceTimersByTime(500);
    await expect(next).resolves.toBeNull();
  });

  it('queues keys pressed between waits', async () => {
    terminal.press('d');
    terminal.press('q');
    await expect(frontend.next(500)).resolves.toBe('right');
    await expect(frontend.next(500)).resolves.toBe('quit');
  });

  it('forgets keys pressed before a flush', async () => {
    terminal.press('q');
    frontend.flush();
    const next = frontend.next(500);
    vi.advanceTimersByTime(500);
    await expect(next).resolves.toBeNull();
  });

  it('hands any key to waitForKey', async () => {
    const key = frontend.waitForKey();
    terminal.press('y');
    await expect(key).resolves.toBe('y');
  });

  it('releases a pending wait on stop', async () => {
    const next = frontend.next(500);
    frontend.stop();
    await expect(next).resolves.toBeNull();
    expect(terminal.port.grabInput).toHaveBeenLastCalledWith(false);
  });

  it('clears the screen before drawing', () => {
    frontend.drawScreen(['Final Score: 10']);
    expect(terminal.port.clear).toHaveBeenCalledTimes(1);
    expect(terminal.writes).toEqual(['Final Score: 10\n']);
  });
});

describe('colorizeMapLine', () => {
  it('colors symbols and leaves fog plain', () => {
    expect(colorizeMapLine('#@ ')).toBe('\x1b[90m#\x1b[0m\x1b[97m@\x1b[0m ');
  });
});

/**
 * Terminal front end (terminal-kit version)
 *
 * Captures raw keys and hands the turn engine one command per wait window,
 * and draws renderer frames with colored map symbols. Terminal access goes
 * through a small port so the front end can run against a fake in tests.
 */

import termKit from 'terminal-kit';
import { CellKind, PLAYER_SYMBOL } from '@/dungeon/CellKind';
import type { Command, CommandSource } from '@/engine/Commands';
import { type Frame, rule } from '@/ui/AsciiRenderer';
import { KeyBindings, type KeyName } from './KeyBindings';

// ============================================================================
// Constants
// ============================================================================

export const RESET = '\x1b[0m';
const GRAY = '\x1b[90m';
const RED = '\x1b[91m';
const GREEN = '\x1b[92m';
const YELLOW = '\x1b[93m';
const BLUE = '\x1b[94m';
const CYAN = '\x1b[96m';
const WHITE = '\x1b[97m';

const SYMBOL_COLORS: Readonly<Record<string, string>> = {
  [PLAYER_SYMBOL]: WHITE,
  [CellKind.WALL]: GRAY,
  [CellKind.EMPTY]: GRAY,
  [CellKind.TRAP]: RED,
  [CellKind.MONSTER]: RED,
  [CellKind.TREASURE]: GREEN,
  [CellKind.EXIT]: BLUE,
};

// ============================================================================
// Terminal port
// ============================================================================

/** The slice of the terminal the front end uses. */
export interface TerminalPort {
  clear(): void;
  write(text: string): void;
  grabInput(enabled: boolean): void;
  hideCursor(hidden: boolean): void;
  fullscreen(enabled: boolean): void;
  onKey(handler: (key: KeyName) => void): void;
  removeKeyHandlers(): void;
}

export function createTerminalKitPort(): TerminalPort {
  const term = termKit.terminal;
  return {
    clear: () => {
      term.clear();
    },
    write: (text) => {
      process.stdout.write(text);
    },
    grabInput: (enabled) => {
      term.grabInput(enabled);
    },
    hideCursor: (hidden) => {
      term.hideCursor(hidden);
    },
    fullscreen: (enabled) => {
      term.fullscreen(enabled);
    },
    onKey: (handler) => {
      term.on('key', (key: string) => handler(key));
    },
    removeKeyHandlers: () => {
      term.removeAllListeners('key');
    },
  };
}

// ============================================================================
// Coloring
// ============================================================================

export function colorize(text: string, color: string): string {
  return `${color}${text}${RESET}`;
}

/** Wrap every map symbol in its color; fog stays plain. */
export function colorizeMapLine(line: string): string {
  return Array.from(line, (ch) => {
    const color = SYMBOL_COLORS[ch];
    return color ? colorize(ch, color) : ch;
  }).join('');
}

// ============================================================================
// TerminalFrontend
// ============================================================================

interface PendingWait {
  resolve: (command: Command | null) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class TerminalFrontend implements CommandSource {
  private readonly _port: TerminalPort;
  private readonly _bindings = new KeyBindings();

  /** Commands typed before anyone asked for them. */
  private readonly _queue: Command[] = [];
  private _pending: PendingWait | null = null;
  private _keyWaiter: ((key: KeyName) => void) | null = null;
  private _started = false;

  constructor(port: TerminalPort = createTerminalKitPort()) {
    this._port = port;
  }

  // ------------------------------------------------------------------
  // Lifecycle
  // ------------------------------------------------------------------

  public start(): void {
    if (this._started) return;
    this._started = true;
    this._port.fullscreen(true);
    this._port.hideCursor(true);
    this._port.grabInput(true);
    this._port.onKey((key) => this._handleKey(key));
  }

  /** Release the terminal. Any outstanding wait resolves as a timeout. */
  public stop(): void {
    if (!this._started) return;
    this._started = false;
    if (this._pending) {
      clearTimeout(this._pending.timer);
      this._pending.resolve(null);
      this._pending = null;
    }
    this._port.removeKeyHandlers();
    this._port.grabInput(false);
    this._port.fullscreen(false);
    this._port.hideCursor(false);
  }

  // ------------------------------------------------------------------
  // Input
  // ------------------------------------------------------------------

  public next(timeoutMs: number): Promise<Command | null> {
    const queued = this._queue.shift();
    if (queued !== undefined) return Promise.resolve(queued);

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this._pending = null;
        resolve(null);
      }, timeoutMs);
      this._pending = { resolve, timer };
    });
  }

  /** Drop commands typed while nobody was waiting for one. */
  public flush(): void {
    this._queue.length = 0;
  }

  /** Wait for the next key of any kind, bound or not. */
  public waitForKey(): Promise<KeyName> {
    return new Promise((resolve) => {
      this._keyWaiter = resolve;
    });
  }

  private _handleKey(key: KeyName): void {
    if (this._keyWaiter) {
      const waiter = this._keyWaiter;
      this._keyWaiter = null;
      waiter(key);
      return;
    }

    const command = this._bindings.commandFor(key);
    if (command === null) return;

    if (this._pending) {
      const { resolve, timer } = this._pending;
      clearTimeout(timer);
      this._pending = null;
      resolve(command);
    } else {
      this._queue.push(command);
    }
  }

  // ------------------------------------------------------------------
  // Output
  // ------------------------------------------------------------------

  public drawFrame(frame: Frame): void {
    this._port.clear();
    const [titleRule, title, ...hud] = frame.header;
    const lines = [
      colorize(titleRule, YELLOW),
      colorize(title, YELLOW),
      ...hud.map((line) => (line === rule('=') || line === rule('-') ? colorize(line, YELLOW) : line)),
      ...frame.map.map(colorizeMapLine),
      ...frame.footer.map((line, i) => (i === 0 ? colorize(line, YELLOW) : i >= 2 ? colorize(line, CYAN) : line)),
    ];
    this._port.write(lines.join('\n') + '\n');
  }

  public drawScreen(lines: readonly string[], color?: string): void {
    this._port.clear();
    const body = lines.join('\n');
    this._port.write((color ? colorize(body, color) : body) + '\n');
  }
}

export const SCREEN_COLORS = { YELLOW, GREEN, RED, CYAN } as const;

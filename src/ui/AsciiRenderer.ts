// ============================================================================
// AsciiRenderer.ts — Plain-text frames for the terminal front end
// Turns a GameSnapshot into lines of text. No colors or cursor control here;
// the terminal layer decorates the lines it is given.
// ============================================================================

import { CellKind, PLAYER_SYMBOL } from '@/dungeon/CellKind';
import { type CoordKey, coordKey } from '@/dungeon/Grid';
import { type GameSnapshot, GameOutcome } from '@/engine/GameState';
import type { GameSummary } from '@/engine/TurnEngine';

// ------------------------------------------------------------------
// Configuration
// ------------------------------------------------------------------

const RULE_WIDTH = 60;
const FOG = ' ';
const HEART = '♥';

export const TITLE = 'TREASURE HUNTER';
export const CONTROLS_LINE = 'Controls: W/↑=Up, A/←=Left, S/↓=Down, D/→=Right, H=Help, Q=Quit';

/** Symbol legend shared by the intro and help screens. */
export const LEGEND: ReadonlyArray<readonly [symbol: string, description: string]> = [
  [PLAYER_SYMBOL, 'Player (you)'],
  [CellKind.TREASURE, 'Treasure'],
  [CellKind.TRAP, 'Trap (reduces health)'],
  [CellKind.MONSTER, 'Monster (reduces health)'],
  [CellKind.EXIT, 'Exit (escape with treasure to win)'],
  [CellKind.WALL, "Wall (can't walk through)"],
  [CellKind.EMPTY, 'Empty space'],
];

const CONTROLS: readonly string[] = [
  '  - W or ↑: Move up',
  '  - A or ←: Move left',
  '  - S or ↓: Move down',
  '  - D or →: Move right',
  '  - H: Show help',
  '  - Q: Quit game',
];

// ------------------------------------------------------------------
// Frames
// ------------------------------------------------------------------

export interface Frame {
  header: string[];
  map: string[];
  footer: string[];
}

export function rule(char: '=' | '-'): string {
  return char.repeat(RULE_WIDTH);
}

export function renderHud(snapshot: GameSnapshot): string {
  const { score, health } = snapshot.player;
  return `Score: ${score}  |  Health: ${HEART.repeat(health)}  |  Turns: ${snapshot.turnCount}`;
}

/**
 * Map rows with fog of war: the player is drawn as `@`, revealed cells by
 * their symbol, everything else as blank space.
 */
export function renderMap(snapshot: GameSnapshot): string[] {
  const revealed = new Set<CoordKey>(snapshot.revealed.map((p) => coordKey(p.x, p.y)));
  const { x: px, y: py } = snapshot.player.position;

  return snapshot.grid.map((row, y) =>
    row
      .map((cell, x) => {
        if (x === px && y === py) return PLAYER_SYMBOL;
        return revealed.has(coordKey(x, y)) ? cell : FOG;
      })
      .join(''),
  );
}

export function renderFrame(snapshot: GameSnapshot, message?: string): Frame {
  const footer = [rule('-'), CONTROLS_LINE];
  if (message) footer.push(message);

  return {
    header: [rule('='), ` ${TITLE} `, rule('='), renderHud(snapshot), rule('-')],
    map: renderMap(snapshot),
    footer,
  };
}

// ------------------------------------------------------------------
// Screens
// ------------------------------------------------------------------

export function renderIntro(): string[] {
  return [
    TITLE,
    '',
    'You are an adventurous explorer searching for the legendary lost treasure.',
    'Explore the dungeon, collect treasure, and avoid dangers.',
    'Find the treasure and make it to the exit alive to win!',
    '',
    'Controls:',
    ...CONTROLS,
    '',
    'Symbols:',
    ...LEGEND.map(([symbol, description]) => `  - ${symbol}: ${description}`),
  ];
}

export function renderHelp(): string[] {
  return [
    `${TITLE} - HELP`,
    rule('='),
    '',
    'Goal: Find the treasure and reach the exit without dying.',
    '',
    'Controls:',
    ...CONTROLS,
    '',
    'Symbols:',
    ...LEGEND.map(([symbol, description]) => `  - ${symbol}: ${description}`),
    '',
    'Tips:',
    '- You have limited health, so avoid traps and monsters when possible.',
    '- You need to find the treasure before you can exit.',
    '- The more efficient your route, the higher your score.',
  ];
}

export function renderGameOver(summary: GameSummary): string[] {
  const headline =
    summary.outcome === GameOutcome.WON
      ? 'Congratulations! You escaped with the treasure!'
      : summary.outcome === GameOutcome.LOST
        ? 'You failed in your quest!'
        : 'You left the dungeon.';

  return [headline, '', `Final Score: ${summary.score}`, `Turns Taken: ${summary.turns}`];
}

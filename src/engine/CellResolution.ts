// ============================================================================
// CellResolution.ts — What happens when the player steps onto a cell
// ============================================================================

import { CellKind, isSingleUse } from '@/dungeon/CellKind';
import { type RandomSource, pick, roll } from '@/dungeon/SeededRNG';
import type { ScoringRules } from './GameConfig';

// ---------------------------------------------------------------------------
// Effects
// ---------------------------------------------------------------------------

export type CellEffect =
  | { type: 'none' }
  | { type: 'valuables'; points: number }
  | { type: 'trap'; damage: number }
  | { type: 'monster'; damage: number; dodged: boolean }
  | { type: 'treasure'; points: number }
  | { type: 'exit'; unlocked: boolean };

export interface CellResolution {
  effect: CellEffect;
  message: string;
  /** Kind the cell holds afterwards; single-use cells turn to EMPTY. */
  remaining: CellKind;
}

// ---------------------------------------------------------------------------
// Flavor text
// ---------------------------------------------------------------------------

export const TRAP_MESSAGES: readonly string[] = [
  'Ouch! You stepped on a trap and lost 1 health!',
  'A spike trap activates beneath you! You lose 1 health!',
  'You triggered a hidden trap! -1 health!',
  'The floor gives way slightly as you step on a pressure plate. A dart hits you! -1 health!',
];

export const MONSTER_MESSAGES: readonly string[] = [
  'A monster attacks you! You lost 1 health!',
  'A dungeon creature lunges at you! -1 health!',
  'A shadowy figure strikes from the darkness! You lose 1 health!',
  'A guardian of the dungeon blocks your path and attacks! -1 health!',
];

export const DODGE_MESSAGE = "You narrowly avoid the monster's attack!";
export const EMPTY_MESSAGE = 'You move into an empty space.';
export const EXIT_LOCKED_MESSAGE = 'This is the exit, but you need to find the treasure first!';
export const EXIT_OPEN_MESSAGE = 'You reached the exit with the treasure! Victory!';

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Decide the effect of entering a cell. Pure apart from the rolls drawn from
 * `rng`; the caller applies damage, score and the cell change to the state.
 */
export function resolveCell(
  kind: CellKind,
  hasTreasure: boolean,
  rng: RandomSource,
  rules: ScoringRules,
): CellResolution {
  return {
    ...describeEntry(kind, hasTreasure, rng, rules),
    remaining: isSingleUse(kind) ? CellKind.EMPTY : kind,
  };
}

function describeEntry(
  kind: CellKind,
  hasTreasure: boolean,
  rng: RandomSource,
  rules: ScoringRules,
): Omit<CellResolution, 'remaining'> {
  switch (kind) {
    case CellKind.EMPTY:
      if (roll(rng, rules.valuablesChance)) {
        return {
          effect: { type: 'valuables', points: rules.valuablesPoints },
          message: `You found a small cache of valuables! (+${rules.valuablesPoints} points)`,
        };
      }
      return { effect: { type: 'none' }, message: EMPTY_MESSAGE };

    case CellKind.TRAP:
      return {
        effect: { type: 'trap', damage: rules.trapDamage },
        message: pick(rng, TRAP_MESSAGES),
      };

    case CellKind.MONSTER:
      // The monster wanders off whether or not it lands a hit.
      if (roll(rng, rules.monsterDodgeChance)) {
        return {
          effect: { type: 'monster', damage: 0, dodged: true },
          message: DODGE_MESSAGE,
        };
      }
      return {
        effect: { type: 'monster', damage: rules.monsterDamage, dodged: false },
        message: pick(rng, MONSTER_MESSAGES),
      };

    case CellKind.TREASURE:
      return {
        effect: { type: 'treasure', points: rules.treasurePoints },
        message: `You found the treasure! Now find the exit! (+${rules.treasurePoints} points)`,
      };

    case CellKind.EXIT:
      return {
        effect: { type: 'exit', unlocked: hasTreasure },
        message: hasTreasure ? EXIT_OPEN_MESSAGE : EXIT_LOCKED_MESSAGE,
      };

    case CellKind.WALL:
      throw new Error('[CellResolution] Walls cannot be entered');
  }
}

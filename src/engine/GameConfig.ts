import { z } from 'zod';
import balanceData from '@/data/balance.json';
import { FALLBACK_MIN_SIZE } from '@/dungeon/FallbackDungeon';

// ── Zod Schemas ──────────────────────────────────────────────────────────────

const probability = z.number().min(0).max(1);

export const ScoringRulesSchema = z.object({
  treasurePoints: z.number().int().min(0),
  valuablesPoints: z.number().int().min(0),
  valuablesChance: probability,
  monsterDodgeChance: probability,
  trapDamage: z.number().int().min(0),
  monsterDamage: z.number().int().min(0),
  turnCost: z.number().int().min(0),
  healthBonusPerPoint: z.number().int().min(0),
  efficiencyBonusBase: z.number().int().min(0),
});

export const GameConfigSchema = z.object({
  width: z.number().int().min(FALLBACK_MIN_SIZE).max(200),
  height: z.number().int().min(FALLBACK_MIN_SIZE).max(100),
  maxHealth: z.number().int().min(1),
  viewDistance: z.number().int().min(0),
  startingScore: z.number().int().min(0),
  inputTimeoutMs: z.number().int().positive(),
  maxGenerationAttempts: z.number().int().min(1),
  scoring: ScoringRulesSchema,
});

// ── Types ────────────────────────────────────────────────────────────────────

export type ScoringRules = z.infer<typeof ScoringRulesSchema>;
export type GameConfig = z.infer<typeof GameConfigSchema>;

export type GameConfigOverrides = Partial<Omit<GameConfig, 'scoring'>> & {
  scoring?: Partial<ScoringRules>;
};

// ── Defaults ─────────────────────────────────────────────────────────────────

export const DEFAULT_GAME_CONFIG: Readonly<GameConfig> = GameConfigSchema.parse({
  width: balanceData.dungeon.width,
  height: balanceData.dungeon.height,
  maxGenerationAttempts: balanceData.dungeon.maxGenerationAttempts,
  maxHealth: balanceData.player.maxHealth,
  viewDistance: balanceData.player.viewDistance,
  startingScore: balanceData.player.startingScore,
  inputTimeoutMs: balanceData.input.timeoutMs,
  scoring: balanceData.scoring,
});

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws z.ZodError when a merged value is out of range.
 */
export function resolveGameConfig(overrides: GameConfigOverrides = {}): GameConfig {
  return GameConfigSchema.parse({
    ...DEFAULT_GAME_CONFIG,
    ...overrides,
    scoring: { ...DEFAULT_GAME_CONFIG.scoring, ...overrides.scoring },
  });
}

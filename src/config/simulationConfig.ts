import { readFileSync, existsSync } from 'node:fs';
import { z, ZodError } from 'zod';
import type { CampaignLevelConfig } from '../core/types.js';

// ─── Schemas ───────────────────────────────────────────────────────────────

export const InsaneModifiersSchema = z.object({
  threatFrequencyMultiplier: z.number().positive().default(2),
  attackDamageMultiplier: z.number().positive().default(1.5),
  creditIncomeMultiplier: z.number().positive().default(0.75),
});

export const VictoryConditionsSchema = z.object({
  requiredDefenseTier: z.number().int().min(0).max(25),
  requiredDefensePoints: z.number().nonnegative(),
  requiredRiskLevel: z.number().int().min(1).max(20),
  requiredCredits: z.number().nonnegative().optional(),
  requiredAttacksSurvived: z.number().int().nonnegative().optional(),
  requiredReportsSent: z.number().int().nonnegative().optional(),
  timeLimitTicks: z.number().int().positive().optional(),
});

export const CampaignLevelSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  startingCredits: z.number().nonnegative().default(0),
  startingThreatLevel: z.number().int().min(1).max(20).default(1),
  availableTiers: z.number().int().min(1).max(25).default(25),
  minimumAttackChance: z.number().min(0).max(100).default(0),
  threatMultiplier: z.number().positive().default(1),
  insaneModifiers: InsaneModifiersSchema.default({}),
  victory: VictoryConditionsSchema,
});

export const OfflineConfigSchema = z.object({
  minSeconds: z.number().nonnegative().default(60),
  capSeconds: z.number().positive().default(28_800),
  efficiency: z.number().min(0).max(1).default(0.5),
  campaignCapSeconds: z.number().positive().default(14_400),
  campaignEfficiency: z.number().min(0).max(1).default(0.3),
});

export const SimulationConfigSchema = z.object({
  maxConcurrentAttacks: z.number().int().positive().default(1),
  autoSubmitReports: z.boolean().default(false),
  autosaveIntervalTicks: z.number().int().positive().default(30),
  offline: OfflineConfigSchema.default({}),
});

export type SimulationConfig = z.infer<typeof SimulationConfigSchema>;
export type OfflineConfig = z.infer<typeof OfflineConfigSchema>;

export const DEFAULT_CONFIG: SimulationConfig = SimulationConfigSchema.parse({});

// ─── Parsing ───────────────────────────────────────────────────────────────

export function formatZodError(err: ZodError): string {
  return err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

function parseWith<S extends z.ZodTypeAny>(schema: S, raw: unknown, label: string): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid ${label}: ${formatZodError(result.error)}`);
  }
  return result.data;
}

export function parseSimulationConfig(raw: unknown): SimulationConfig {
  return parseWith(SimulationConfigSchema, raw, 'simulation config');
}

export function parseCampaignLevel(raw: unknown): CampaignLevelConfig {
  return parseWith(CampaignLevelSchema, raw, 'campaign level');
}

/** Read a JSON config file. Returns null (and logs) when missing or invalid. */
export function loadConfigFile(path: string): SimulationConfig | null {
  if (!existsSync(path)) {
    console.warn(`[Config] ${path} not found`);
    return null;
  }
  try {
    return parseSimulationConfig(JSON.parse(readFileSync(path, 'utf8')));
  } catch (err) {
    console.error('[Config] Failed to load config:', err);
    return null;
  }
}

// ─── Derived run modifiers ─────────────────────────────────────────────────

export interface RunModifiers {
  frequencyMultiplier: number;
  minimumAttackChance: number;
  damageMultiplier: number;
  creditIncomeMultiplier: number;
}

export const NEUTRAL_MODIFIERS: RunModifiers = {
  frequencyMultiplier: 1,
  minimumAttackChance: 0,
  damageMultiplier: 1,
  creditIncomeMultiplier: 1,
};

export function runModifiers(level: CampaignLevelConfig | null, insane: boolean): RunModifiers {
  if (!level) return NEUTRAL_MODIFIERS;
  const mods = level.insaneModifiers;
  return {
    frequencyMultiplier: level.threatMultiplier * (insane ? mods.threatFrequencyMultiplier : 1),
    minimumAttackChance: level.minimumAttackChance,
    damageMultiplier: insane ? mods.attackDamageMultiplier : 1,
    creditIncomeMultiplier: insane ? mods.creditIncomeMultiplier : 1,
  };
}

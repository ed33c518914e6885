import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { DefenseCategory, UnitKind } from '../core/types.js';

// ─── Tier table (data/tiers.json) ──────────────────────────────────────────

const ceiling = z.number().positive().nullable();
const cost = z.number().nonnegative();

const TierRowSchema = z.object({
  tier: z.number().int().min(1).max(25),
  name: z.string().min(1),
  maxLevel: z.number().int().positive(),
  source: z.object({ baseProduction: z.number().positive(), ceiling, unlockCost: cost }),
  link: z.object({
    baseBandwidth: z.number().positive(),
    baseLatency: z.number().int().nonnegative(),
    ceiling,
    unlockCost: cost,
  }),
  sink: z.object({
    baseProcessingRate: z.number().positive(),
    conversionRate: z.number().positive(),
    ceiling,
    unlockCost: cost,
  }),
  firewall: z.object({
    baseHealth: z.number().positive(),
    baseDamageReduction: z.number().min(0).max(1),
    ceiling,
    unlockCost: cost,
  }),
  defenseAppUnlockCost: cost,
});

const TierTableSchema = z.object({
  tiers: z.array(TierRowSchema).length(25),
});

export type TierRow = z.infer<typeof TierRowSchema>;

function loadTierTable(): TierRow[] {
  const url = new URL('../../data/tiers.json', import.meta.url);
  const parsed = TierTableSchema.parse(JSON.parse(readFileSync(url, 'utf8')));
  parsed.tiers.forEach((row, i) => {
    if (row.tier !== i + 1) {
      throw new Error(`tiers.json: row ${i} has tier ${row.tier}, expected ${i + 1}`);
    }
  });
  return parsed.tiers;
}

export const TIERS: readonly TierRow[] = loadTierTable();
export const MAX_TIER = TIERS.length;

/** Clamp to 1–25 and return that tier's row. */
export function tierRow(tier: number): TierRow {
  const idx = Math.min(MAX_TIER, Math.max(1, Math.floor(tier))) - 1;
  return TIERS[idx];
}

// ─── Unit catalog (pipeline nodes + perimeter firewall) ────────────────────

export interface UnitDefinition {
  id: string;
  kind: UnitKind;
  tier: number;
  name: string;
  unlockCost: number;
}

const UNIT_NOUNS: Record<UnitKind, string> = {
  source: 'Harvester',
  link: 'Relay',
  sink: 'Exchange',
  firewall: 'Firewall',
};

export const UNIT_KINDS: readonly UnitKind[] = ['source', 'link', 'sink', 'firewall'];

export function unitId(kind: UnitKind, tier: number): string {
  return `${kind}_t${tier}`;
}

export const UNIT_CATALOG: readonly UnitDefinition[] = TIERS.flatMap((row) =>
  UNIT_KINDS.map((kind) => ({
    id: unitId(kind, row.tier),
    kind,
    tier: row.tier,
    name: `${row.name} ${UNIT_NOUNS[kind]}`,
    unlockCost: row[kind].unlockCost,
  })),
);

export const UNIT_MAP: Readonly<Record<string, UnitDefinition>> = Object.fromEntries(
  UNIT_CATALOG.map((u) => [u.id, u]),
);

/** Units every run starts with. */
export const STARTER_UNITS: readonly string[] = [
  unitId('source', 1),
  unitId('link', 1),
  unitId('sink', 1),
];

// ─── Defense application catalog ───────────────────────────────────────────

export interface DefenseAppDefinition {
  id: string;
  category: DefenseCategory;
  tier: number;
  name: string;
  unlockCost: number;
  /** App that must be unlocked (and maxed) first; null for tier 1 */
  prerequisiteId: string | null;
}

export const DEFENSE_CATEGORIES: readonly DefenseCategory[] = [
  'firewall',
  'siem',
  'endpoint',
  'ids',
  'network',
  'encryption',
];

const CATEGORY_LABELS: Record<DefenseCategory, string> = {
  firewall: 'Firewall',
  siem: 'SIEM',
  endpoint: 'Endpoint Guard',
  ids: 'IDS',
  network: 'Network Shield',
  encryption: 'Encryption',
};

export function defenseAppId(category: DefenseCategory, tier: number): string {
  return `${category}_t${tier}`;
}

export const DEFENSE_APP_CATALOG: readonly DefenseAppDefinition[] = DEFENSE_CATEGORIES.flatMap((category) =>
  TIERS.map((row) => ({
    id: defenseAppId(category, row.tier),
    category,
    tier: row.tier,
    name: `${row.name} ${CATEGORY_LABELS[category]}`,
    unlockCost: row.defenseAppUnlockCost,
    prerequisiteId: row.tier > 1 ? defenseAppId(category, row.tier - 1) : null,
  })),
);

export const DEFENSE_APP_MAP: Readonly<Record<string, DefenseAppDefinition>> = Object.fromEntries(
  DEFENSE_APP_CATALOG.map((a) => [a.id, a]),
);

import type { UnitKind } from './types.js';
import { TIERS, MAX_TIER, tierRow } from '../content/catalog.js';

// ─── Tier lookups ──────────────────────────────────────────────────────────

/** Highest level reachable before the next tier must be unlocked. */
export function maxLevelForTier(tier: number): number {
  return tierRow(tier).maxLevel;
}

export function tierName(tier: number): string {
  return tierRow(tier).name;
}

/**
 * Tier a unit's defining base stat falls into: the first tier whose ceiling
 * exceeds the value, else the top tier.
 */
export function tierForValue(kind: UnitKind, value: number): number {
  for (const row of TIERS) {
    const ceiling = row[kind].ceiling;
    if (ceiling === null || value < ceiling) return row.tier;
  }
  return MAX_TIER;
}

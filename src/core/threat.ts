import type { ThreatState } from './types.js';
import {
  THREAT_LEVELS,
  NET_DEFENSE_NAMES,
  MAX_THREAT_LEVEL,
  CAMPAIGN_THREAT_FLOOR_START,
  threatLevelDefinition,
} from '../content/threatLevels.js';

// ─── Threat level ──────────────────────────────────────────────────────────

export function threatLevelName(level: number): string {
  return threatLevelDefinition(level).name;
}

export function attackChancePercent(level: number): number {
  return threatLevelDefinition(level).attackChance;
}

export function severityMultiplier(level: number): number {
  return threatLevelDefinition(level).severityMultiplier;
}

/**
 * Threat level implied by lifetime credits, the highest owned tier, and the
 * campaign level (levels from 8 up impose a floor equal to their id).
 * The highest level reached by any route wins.
 */
export function threatLevelFor(totalCredits: number, highestTier: number, campaignLevelId = 0): number {
  let level = 1;
  for (const def of THREAT_LEVELS) {
    const byCredits = totalCredits >= def.creditThreshold;
    const byTier = def.tierFloor !== null && highestTier >= def.tierFloor;
    if (byCredits || byTier) level = def.level;
  }
  if (campaignLevelId >= CAMPAIGN_THREAT_FLOOR_START) {
    level = Math.max(level, Math.min(MAX_THREAT_LEVEL, campaignLevelId));
  }
  return level;
}

/** Raise the stored level to `candidate` if higher; never lowers it. */
export function updateThreatLevel(threat: ThreatState, candidate: number): ThreatState {
  const next = Math.min(MAX_THREAT_LEVEL, Math.max(threat.currentLevel, Math.floor(candidate)));
  return next === threat.currentLevel ? threat : { ...threat, currentLevel: next };
}

// ─── Net defense (display only) ────────────────────────────────────────────

export const MAX_NET_DEFENSE = NET_DEFENSE_NAMES.length - 1;

/**
 * Net defense level from the perimeter firewall. Tier 0 means no firewall.
 * Low health costs one level below 50% and two below 25%.
 */
export function calculateNetDefense(firewallTier: number, firewallLevel: number, healthPct: number): number {
  if (firewallTier <= 0) return 0;
  let score = firewallTier + Math.floor(firewallLevel / 5);
  if (healthPct < 0.25) score -= 2;
  else if (healthPct < 0.5) score -= 1;
  return Math.min(MAX_NET_DEFENSE, Math.max(0, score));
}

export function netDefenseName(level: number): string {
  return NET_DEFENSE_NAMES[Math.min(MAX_NET_DEFENSE, Math.max(0, Math.floor(level)))];
}

/** 8% per net-defense level, up to 72%. */
export function netDefenseDamageReduction(level: number): number {
  return Math.min(0.72, Math.max(0, level) * 0.08);
}

// ─── Risk ──────────────────────────────────────────────────────────────────

export interface RiskCalculation {
  threatLevel: number;
  netDefenseLevel: number;
  /** threat − net defense, floored at 1; display only */
  effectiveRisk: number;
  damageReduction: number;
}

export function riskCalculation(threat: ThreatState): RiskCalculation {
  return {
    threatLevel: threat.currentLevel,
    netDefenseLevel: threat.netDefenseLevel,
    effectiveRisk: Math.max(1, threat.currentLevel - threat.netDefenseLevel),
    damageReduction: netDefenseDamageReduction(threat.netDefenseLevel),
  };
}

export function createThreatState(startingLevel = 1): ThreatState {
  return {
    currentLevel: Math.min(MAX_THREAT_LEVEL, Math.max(1, Math.floor(startingLevel))),
    netDefenseLevel: 0,
    activeAttacks: [],
    attacksSurvived: 0,
    attacksPrevented: 0,
    totalDamageReceived: 0,
    totalDamageBlocked: 0,
  };
}

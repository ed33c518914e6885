import type { DefenseApp, DefenseCategory, DefenseStackState } from './types.js';
import { DEFENSE_APP_MAP, DEFENSE_CATEGORIES, defenseAppId } from '../content/catalog.js';
import { maxLevelForTier } from './tiers.js';

// ─── Per-application stats ─────────────────────────────────────────────────

export function defensePoints(app: DefenseApp): number {
  return app.level * 10 * Math.pow(2, app.tier - 1);
}

/** Ceiling on a single app's damage reduction, by tier. */
export function appReductionCap(tier: number): number {
  if (tier <= 6) return 0.05 * Math.max(1, tier);
  if (tier <= 10) return 0.30 + 0.02 * (tier - 6);
  if (tier <= 15) return 0.38 + 0.02 * (tier - 10);
  if (tier <= 20) return 0.48 + 0.02 * (tier - 15);
  return 0.58 + 0.02 * (Math.min(25, tier) - 20);
}

export function appDamageReduction(app: DefenseApp): number {
  const base = Math.min(0.5, 0.02 * app.tier) + 0.005 * app.level;
  return Math.min(appReductionCap(app.tier), base);
}

const DETECTION_PER_TIER: Record<DefenseCategory, number> = {
  siem: 0.15,
  ids: 0.10,
  endpoint: 0.05,
  firewall: 0.02,
  network: 0.02,
  encryption: 0.02,
};

export function appDetectionBonus(app: DefenseApp): number {
  return DETECTION_PER_TIER[app.category] * app.tier + 0.01 * app.level;
}

type AutomationCurve = readonly [base: number, perLevel: number] | null;

// T1–T6 automation; later tiers follow a shared curve.
const EARLY_AUTOMATION: Record<DefenseCategory, readonly AutomationCurve[]> = {
  firewall: [null, null, [0.10, 0.015], [0.35, 0.03], [0.35, 0.03], [0.55, 0.04]],
  siem: [null, null, [0.15, 0.02], [0.30, 0.03], [0.40, 0.035], [0.60, 0.04]],
  endpoint: [null, null, [0.20, 0.02], [0.25, 0.025], [0.50, 0.04], [0.65, 0.045]],
  ids: [null, null, null, [0.25, 0.025], [0.35, 0.03], [0.55, 0.04]],
  network: [null, null, null, null, [0.35, 0.03], [0.55, 0.04]],
  encryption: [null, null, null, [0.35, 0.03], null, null],
};

export function appAutomation(app: DefenseApp): number {
  if (app.tier >= 7) {
    return Math.min(0.99, 0.65 + 0.015 * (app.tier - 6) + 0.005 * app.level);
  }
  const curve = EARLY_AUTOMATION[app.category][app.tier - 1];
  if (!curve) return 0;
  const [base, perLevel] = curve;
  return base + perLevel * app.level;
}

export function appIntelMultiplier(app: DefenseApp): number {
  switch (app.category) {
    case 'siem':
      return 1 + 0.25 * app.tier + 0.05 * app.level;
    case 'ids':
      return 1 + 0.15 * app.tier + 0.03 * app.level;
    default:
      return 1;
  }
}

export function appUpgradeCost(app: DefenseApp): number {
  return 250 * app.tier * Math.pow(1.25, app.level);
}

export function appMaxLevel(app: DefenseApp): number {
  return maxLevelForTier(app.tier);
}

// ─── Stack aggregates ──────────────────────────────────────────────────────

export function deployedApps(stack: DefenseStackState): DefenseApp[] {
  return DEFENSE_CATEGORIES.flatMap((c) => {
    const app = stack.apps[c];
    return app ? [app] : [];
  });
}

export function deployedCount(stack: DefenseStackState): number {
  return deployedApps(stack).length;
}

export function highestDeployedTier(stack: DefenseStackState): number {
  return deployedApps(stack).reduce((max, a) => Math.max(max, a.tier), 0);
}

export function totalDefensePoints(stack: DefenseStackState): number {
  return deployedApps(stack).reduce((sum, a) => sum + defensePoints(a), 0);
}

/**
 * Frequency reduction implied by defense points (10k points = 50%).
 * Reported for display; attack generation is driven by raw threat level.
 */
export function attackFrequencyReduction(stack: DefenseStackState): number {
  return Math.min(0.5, totalDefensePoints(stack) / 10000);
}

/** Stack-wide reduction ceiling, set by the highest deployed tier. */
export function stackReductionCap(highestTier: number): number {
  if (highestTier <= 4) return 0.60;
  if (highestTier === 5) return 0.70;
  if (highestTier === 6) return 0.80;
  if (highestTier <= 10) return 0.85;
  if (highestTier <= 15) return 0.90;
  if (highestTier <= 20) return 0.93;
  return 0.95;
}

export function totalDamageReduction(stack: DefenseStackState): number {
  const sum = deployedApps(stack).reduce((acc, a) => acc + appDamageReduction(a), 0);
  return Math.min(stackReductionCap(highestDeployedTier(stack)), sum);
}

export function totalDetectionBonus(stack: DefenseStackState): number {
  return deployedApps(stack).reduce((sum, a) => sum + appDetectionBonus(a), 0);
}

export function totalAutomation(stack: DefenseStackState): number {
  return Math.min(1, deployedApps(stack).reduce((sum, a) => sum + appAutomation(a), 0));
}

export function totalIntelMultiplier(stack: DefenseStackState): number {
  return deployedApps(stack).reduce((product, a) => product * appIntelMultiplier(a), 1);
}

// ─── Unlock / deploy / upgrade ─────────────────────────────────────────────

export type UnlockGate =
  | 'already-unlocked'
  | 'unknown-app'
  | 'tier-unavailable'
  | 'prerequisite-locked'
  | 'prerequisite-not-deployed'
  | 'prerequisite-not-maxed';

export function isUnlocked(stack: DefenseStackState, appId: string): boolean {
  return stack.unlocked.includes(appId);
}

/**
 * Why `appId` cannot be unlocked yet, or null when it can.
 * Tier N+1 needs tier N unlocked and deployed in the category at its max level.
 */
export function unlockGate(stack: DefenseStackState, appId: string, maxAvailableTier = 25): UnlockGate | null {
  const def = DEFENSE_APP_MAP[appId];
  if (!def) return 'unknown-app';
  if (isUnlocked(stack, appId)) return 'already-unlocked';
  if (def.tier > maxAvailableTier) return 'tier-unavailable';
  if (def.prerequisiteId === null) return null;
  if (!isUnlocked(stack, def.prerequisiteId)) return 'prerequisite-locked';

  const current = stack.apps[def.category];
  if (!current || current.tier !== def.tier - 1) return 'prerequisite-not-deployed';
  if (current.level < appMaxLevel(current)) return 'prerequisite-not-maxed';
  return null;
}

export function canUnlock(stack: DefenseStackState, appId: string, maxAvailableTier = 25): boolean {
  return unlockGate(stack, appId, maxAvailableTier) === null;
}

/** Player-facing explanation for a gate. */
export function describeUnlockGate(stack: DefenseStackState, appId: string, maxAvailableTier = 25): string | null {
  const gate = unlockGate(stack, appId, maxAvailableTier);
  if (gate === null) return null;
  const def = DEFENSE_APP_MAP[appId];
  if (!def) return `Unknown app ${appId}`;
  const prevTier = def.tier - 1;
  switch (gate) {
    case 'already-unlocked':
      return 'Already unlocked';
    case 'unknown-app':
      return `Unknown app ${appId}`;
    case 'tier-unavailable':
      return `T${def.tier} is not available in this level`;
    case 'prerequisite-locked':
      return `Unlock T${prevTier} first`;
    case 'prerequisite-not-deployed':
      return `Deploy T${prevTier} first`;
    case 'prerequisite-not-maxed': {
      const current = stack.apps[def.category];
      const level = current ? current.level : 0;
      return `Max level T${prevTier} first (${level}/${maxLevelForTier(prevTier)})`;
    }
  }
}

export function unlockApp(stack: DefenseStackState, appId: string): DefenseStackState {
  if (isUnlocked(stack, appId)) return stack;
  return { ...stack, unlocked: [...stack.unlocked, appId] };
}

/** Replace the category's app with a fresh level-1 app. Null if the tier is locked. */
export function deployApp(stack: DefenseStackState, category: DefenseCategory, tier: number): DefenseStackState | null {
  if (!isUnlocked(stack, defenseAppId(category, tier))) return null;
  return { ...stack, apps: { ...stack.apps, [category]: { category, tier, level: 1 } } };
}

/** Null when nothing is deployed in the category or the app is maxed. */
export function upgradeApp(stack: DefenseStackState, category: DefenseCategory): DefenseStackState | null {
  const app = stack.apps[category];
  if (!app || app.level >= appMaxLevel(app)) return null;
  return { ...stack, apps: { ...stack.apps, [category]: { ...app, level: app.level + 1 } } };
}

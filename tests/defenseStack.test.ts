import { describe, it, expect } from 'vitest';
import type { DefenseApp, DefenseCategory, DefenseStackState } from '../src/core/types.js';
import {
  appAutomation,
  appDamageReduction,
  appReductionCap,
  appUpgradeCost,
  attackFrequencyReduction,
  defensePoints,
  deployApp,
  describeUnlockGate,
  highestDeployedTier,
  stackReductionCap,
  totalAutomation,
  totalDamageReduction,
  totalDefensePoints,
  totalDetectionBonus,
  totalIntelMultiplier,
  unlockApp,
  unlockGate,
  upgradeApp,
} from '../src/core/defenseStack.js';
import { DEFENSE_CATEGORIES } from '../src/content/catalog.js';

const app = (category: DefenseCategory, tier: number, level: number): DefenseApp => ({ category, tier, level });

function stackOf(...apps: DefenseApp[]): DefenseStackState {
  const stack: DefenseStackState = { apps: {}, unlocked: [] };
  for (const a of apps) stack.apps[a.category] = a;
  return stack;
}

describe('defense application stats', () => {
  it('doubles defense points per tier', () => {
    expect(defensePoints(app('siem', 1, 1))).toBe(10);
    expect(defensePoints(app('siem', 3, 2))).toBe(80);
  });

  it('caps per-app reduction by tier', () => {
    expect(appReductionCap(1)).toBeCloseTo(0.05);
    expect(appReductionCap(4)).toBeCloseTo(0.2);
    expect(appReductionCap(6)).toBeCloseTo(0.3);
    expect(appReductionCap(7)).toBeCloseTo(0.32);
    expect(appReductionCap(10)).toBeCloseTo(0.38);
    expect(appReductionCap(25)).toBeCloseTo(0.68);
  });

  it('blends tier and level, then applies the cap', () => {
    expect(appDamageReduction(app('firewall', 1, 1))).toBeCloseTo(0.025);
    expect(appDamageReduction(app('firewall', 1, 10))).toBeCloseTo(0.05);
  });

  it('has no automation until the early table says so', () => {
    expect(appAutomation(app('firewall', 1, 5))).toBe(0);
    expect(appAutomation(app('firewall', 3, 1))).toBeCloseTo(0.115);
    expect(appAutomation(app('siem', 7, 1))).toBeCloseTo(0.67);
  });

  it('prices upgrades at 250 × tier × 1.25^level', () => {
    expect(appUpgradeCost(app('ids', 1, 1))).toBeCloseTo(312.5);
    expect(appUpgradeCost(app('ids', 2, 2))).toBeCloseTo(781.25);
  });
});

describe('stack totals', () => {
  it('never exceeds the tier-band reduction cap', () => {
    const maxed = stackOf(...DEFENSE_CATEGORIES.map((c) => app(c, 4, 25)));
    expect(totalDamageReduction(maxed)).toBe(0.6);

    for (let tier = 1; tier <= 25; tier++) {
      const stack = stackOf(...DEFENSE_CATEGORIES.map((c) => app(c, tier, 50)));
      expect(totalDamageReduction(stack)).toBeLessThanOrEqual(stackReductionCap(highestDeployedTier(stack)));
    }
  });

  it('sets the band cap from the highest deployed tier', () => {
    expect(stackReductionCap(0)).toBe(0.6);
    expect(stackReductionCap(5)).toBe(0.7);
    expect(stackReductionCap(6)).toBe(0.8);
    expect(stackReductionCap(10)).toBe(0.85);
    expect(stackReductionCap(15)).toBe(0.9);
    expect(stackReductionCap(20)).toBe(0.93);
    expect(stackReductionCap(25)).toBe(0.95);
  });

  it('sums points and detection, multiplies intel', () => {
    const stack = stackOf(app('siem', 1, 1), app('ids', 1, 1));
    expect(totalDefensePoints(stack)).toBe(20);
    expect(totalDetectionBonus(stack)).toBeCloseTo(0.27);
    expect(totalIntelMultiplier(stack)).toBeCloseTo(1.3 * 1.18);
  });

  it('caps automation at 1', () => {
    const stack = stackOf(...DEFENSE_CATEGORIES.map((c) => app(c, 10, 50)));
    expect(totalAutomation(stack)).toBe(1);
  });

  it('reports frequency reduction from points, capped at half', () => {
    expect(attackFrequencyReduction(stackOf(app('siem', 1, 1)))).toBeCloseTo(0.001);
    expect(attackFrequencyReduction(stackOf(app('siem', 12, 10)))).toBe(0.5);
  });

  it('is empty with nothing deployed', () => {
    const empty = stackOf();
    expect(highestDeployedTier(empty)).toBe(0);
    expect(totalDamageReduction(empty)).toBe(0);
    expect(totalIntelMultiplier(empty)).toBe(1);
  });
});

describe('unlock gating', () => {
  it('lets tier 1 through with no prerequisite', () => {
    expect(unlockGate(stackOf(), 'siem_t1')).toBeNull();
  });

  it('rejects unknown and already-unlocked apps', () => {
    expect(unlockGate(stackOf(), 'siem_t99')).toBe('unknown-app');
    const stack = unlockApp(stackOf(), 'siem_t1');
    expect(unlockGate(stack, 'siem_t1')).toBe('already-unlocked');
  });

  it('requires the previous tier unlocked, deployed, and maxed', () => {
    expect(unlockGate(stackOf(), 'siem_t2')).toBe('prerequisite-locked');

    const unlocked = unlockApp(stackOf(), 'siem_t1');
    expect(unlockGate(unlocked, 'siem_t2')).toBe('prerequisite-not-deployed');

    const deployed = deployApp(unlocked, 'siem', 1);
    expect(deployed).not.toBeNull();
    if (!deployed) return;
    expect(unlockGate(deployed, 'siem_t2')).toBe('prerequisite-not-maxed');
    expect(describeUnlockGate(deployed, 'siem_t2')).toBe('Max level T1 first (1/10)');

    const maxed: DefenseStackState = { ...deployed, apps: { siem: app('siem', 1, 10) } };
    expect(unlockGate(maxed, 'siem_t2')).toBeNull();
    expect(describeUnlockGate(maxed, 'siem_t2')).toBeNull();
  });

  it('rejects tiers beyond the level cap', () => {
    const maxed: DefenseStackState = { apps: { siem: app('siem', 1, 10) }, unlocked: ['siem_t1'] };
    expect(unlockGate(maxed, 'siem_t2', 1)).toBe('tier-unavailable');
  });

  it('only deploys unlocked tiers, fresh at level 1', () => {
    expect(deployApp(stackOf(), 'ids', 1)).toBeNull();
    const stack = deployApp(unlockApp(stackOf(), 'ids_t1'), 'ids', 1);
    expect(stack?.apps.ids).toEqual({ category: 'ids', tier: 1, level: 1 });
  });

  it('stops upgrades at the tier max level', () => {
    expect(upgradeApp(stackOf(app('ids', 1, 10)), 'ids')).toBeNull();
    expect(upgradeApp(stackOf(), 'ids')).toBeNull();
    expect(upgradeApp(stackOf(app('ids', 1, 3)), 'ids')?.apps.ids?.level).toBe(4);
  });
});

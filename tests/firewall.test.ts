import { describe, it, expect } from 'vitest';
import type { FirewallNode } from '../src/core/types.js';
import {
  absorbDamage,
  firewallDamageReduction,
  firewallMaxHealth,
  firewallUpgradeCost,
  healthPercentage,
  isDestroyed,
  regenerate,
  repair,
  repairCost,
  restoreHealth,
  upgradeFirewall,
} from '../src/core/firewall.js';
import { createRng } from '../src/core/rng.js';

const firewall = (currentHealth = 150, level = 1): FirewallNode => ({
  unitId: 'firewall_t1',
  name: 'Test Firewall',
  baseHealth: 100,
  baseDamageReduction: 0.2,
  currentHealth,
  level,
});

describe('firewall', () => {
  it('derives max health and damage reduction', () => {
    const fw = firewall();
    expect(firewallMaxHealth(fw)).toBe(150);
    expect(firewallDamageReduction(fw)).toBeCloseTo(0.25);
    expect(firewallUpgradeCost(fw)).toBeCloseTo(59);
  });

  it('caps damage reduction at 60%', () => {
    expect(firewallDamageReduction(firewall(150, 10))).toBe(0.6);
  });

  it('reduces, then absorbs, damage within its health', () => {
    const result = absorbDamage(firewall(), 100);
    expect(result.absorbed).toBeCloseTo(75);
    expect(result.passThrough).toBeCloseTo(0);
    expect(result.firewall.currentHealth).toBeCloseTo(75);
  });

  it('passes through what health cannot absorb', () => {
    const result = absorbDamage(firewall(), 300);
    expect(result.absorbed).toBe(150);
    expect(result.passThrough).toBeCloseTo(75);
    expect(result.firewall.currentHealth).toBe(0);
    expect(isDestroyed(result.firewall)).toBe(true);
  });

  it('lets damage through unreduced once destroyed', () => {
    const result = absorbDamage(firewall(0), 40);
    expect(result.absorbed).toBe(0);
    expect(result.passThrough).toBe(40);
  });

  it('regenerates 2% of max health per level each tick', () => {
    expect(regenerate(firewall(75)).currentHealth).toBeCloseTo(78);
    expect(regenerate(firewall(149)).currentHealth).toBe(150);
  });

  it('restores a share of max health', () => {
    expect(restoreHealth(firewall(75), 0.1).currentHealth).toBeCloseTo(90);
    expect(restoreHealth(firewall(145), 0.1).currentHealth).toBe(150);
  });

  it('charges half the missing health to repair', () => {
    const fw = firewall(75);
    expect(repairCost(fw)).toBeCloseTo(37.5);
    expect(repair(fw).currentHealth).toBe(150);
    expect(repairCost(firewall())).toBe(0);
  });

  it('heals to the new maximum on upgrade', () => {
    const up = upgradeFirewall(firewall(10));
    expect(up.level).toBe(2);
    expect(up.currentHealth).toBe(300);
    expect(healthPercentage(up)).toBe(1);
  });

  it('keeps health within [0, max] under mixed damage and regeneration', () => {
    const rng = createRng(99);
    let fw = firewall();
    for (let i = 0; i < 500; i++) {
      fw = absorbDamage(fw, rng.nextFloat(0, 120)).firewall;
      fw = regenerate(fw);
      expect(fw.currentHealth).toBeGreaterThanOrEqual(0);
      expect(fw.currentHealth).toBeLessThanOrEqual(firewallMaxHealth(fw));
    }
  });
});

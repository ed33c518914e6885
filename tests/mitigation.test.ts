import { describe, it, expect } from 'vitest';
import type { DamageEnvelope, FirewallNode } from '../src/core/types.js';
import { MAX_PERCENT_MITIGATION, combinedPercentReduction, mitigate } from '../src/core/mitigation.js';

const firewall = (currentHealth: number): FirewallNode => ({
  unitId: 'firewall_t1',
  name: 'Test Firewall',
  baseHealth: 100,
  baseDamageReduction: 0.2,
  currentHealth,
  level: 1,
});

const damage = (creditDrain: number, bandwidthReduction = 0): DamageEnvelope => ({
  creditDrain,
  bandwidthReduction,
  nodeDisableChance: 0,
  processingReduction: 0,
});

describe('combinedPercentReduction', () => {
  it('compounds the stack and net-defense layers', () => {
    expect(combinedPercentReduction(0.5, 0.5)).toBeCloseTo(0.75);
    expect(combinedPercentReduction(0, 0.24)).toBeCloseTo(0.24);
  });

  it('never removes more than the cap', () => {
    expect(combinedPercentReduction(0.6, 0.72)).toBe(MAX_PERCENT_MITIGATION);
    expect(combinedPercentReduction(1, 1)).toBe(MAX_PERCENT_MITIGATION);
  });
});

describe('mitigate', () => {
  it('applies percentage layers when there is no firewall', () => {
    const result = mitigate(damage(100, 0.3), { firewall: null, stackReduction: 0.5, netDefenseReduction: 0.24 });
    expect(result.damage.creditDrain).toBeCloseTo(38);
    expect(result.percentMitigated).toBeCloseTo(62);
    expect(result.firewallMitigated).toBe(0);
    expect(result.damage.bandwidthReduction).toBeCloseTo(0.114);
    expect(result.firewall).toBeNull();
  });

  it('lets a healthy firewall take everything first', () => {
    const result = mitigate(damage(100), { firewall: firewall(150), stackReduction: 0.5, netDefenseReduction: 0 });
    expect(result.absorbedByFirewall).toBeCloseTo(75);
    expect(result.firewallMitigated).toBeCloseTo(100);
    expect(result.damage.creditDrain).toBeCloseTo(0);
    expect(result.firewall?.currentHealth).toBeCloseTo(75);
  });

  it('reduces only what gets past the firewall', () => {
    const result = mitigate(damage(100), { firewall: firewall(10), stackReduction: 0.5, netDefenseReduction: 0 });
    expect(result.absorbedByFirewall).toBe(10);
    expect(result.firewallMitigated).toBeCloseTo(35);
    expect(result.percentMitigated).toBeCloseTo(32.5);
    expect(result.damage.creditDrain).toBeCloseTo(32.5);
    expect(result.firewall?.currentHealth).toBe(0);
  });

  it('accounts for every credit of drain', () => {
    const raw = damage(250);
    const result = mitigate(raw, { firewall: firewall(40), stackReduction: 0.3, netDefenseReduction: 0.16 });
    expect(result.firewallMitigated + result.percentMitigated + result.damage.creditDrain).toBeCloseTo(250);
  });
});

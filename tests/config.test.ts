import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DEFAULT_CONFIG,
  NEUTRAL_MODIFIERS,
  loadConfigFile,
  parseCampaignLevel,
  parseSimulationConfig,
  runModifiers,
} from '../src/config/simulationConfig.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('simulation config', () => {
  it('fills defaults', () => {
    expect(DEFAULT_CONFIG).toEqual({
      maxConcurrentAttacks: 1,
      autoSubmitReports: false,
      autosaveIntervalTicks: 30,
      offline: {
        minSeconds: 60,
        capSeconds: 28_800,
        efficiency: 0.5,
        campaignCapSeconds: 14_400,
        campaignEfficiency: 0.3,
      },
    });
  });

  it('keeps overrides and defaults the rest', () => {
    const config = parseSimulationConfig({ maxConcurrentAttacks: 3, offline: { efficiency: 0.25 } });
    expect(config.maxConcurrentAttacks).toBe(3);
    expect(config.offline.efficiency).toBe(0.25);
    expect(config.offline.capSeconds).toBe(28_800);
  });

  it('rejects invalid values with the field path', () => {
    expect(() => parseSimulationConfig({ maxConcurrentAttacks: 0 })).toThrow(
      /^Invalid simulation config: maxConcurrentAttacks: /,
    );
  });
});

describe('campaign levels', () => {
  it('requires victory conditions', () => {
    expect(() => parseCampaignLevel({ id: 1, name: 'No Goal' })).toThrow('Invalid campaign level: victory: Required');
  });

  it('fills level defaults', () => {
    const level = parseCampaignLevel({
      id: 3,
      name: 'Defaults',
      victory: { requiredDefenseTier: 1, requiredDefensePoints: 0, requiredRiskLevel: 5 },
    });
    expect(level.startingCredits).toBe(0);
    expect(level.startingThreatLevel).toBe(1);
    expect(level.availableTiers).toBe(25);
    expect(level.threatMultiplier).toBe(1);
    expect(level.insaneModifiers).toEqual({
      threatFrequencyMultiplier: 2,
      attackDamageMultiplier: 1.5,
      creditIncomeMultiplier: 0.75,
    });
  });
});

describe('runModifiers', () => {
  const level = parseCampaignLevel({
    id: 1,
    name: 'Hot Zone',
    threatMultiplier: 1.5,
    minimumAttackChance: 4,
    victory: { requiredDefenseTier: 1, requiredDefensePoints: 0, requiredRiskLevel: 5 },
  });

  it('is neutral outside a campaign', () => {
    expect(runModifiers(null, true)).toBe(NEUTRAL_MODIFIERS);
  });

  it('applies the level multiplier in normal mode', () => {
    expect(runModifiers(level, false)).toEqual({
      frequencyMultiplier: 1.5,
      minimumAttackChance: 4,
      damageMultiplier: 1,
      creditIncomeMultiplier: 1,
    });
  });

  it('stacks insane modifiers on top', () => {
    expect(runModifiers(level, true)).toEqual({
      frequencyMultiplier: 3,
      minimumAttackChance: 4,
      damageMultiplier: 1.5,
      creditIncomeMultiplier: 0.75,
    });
  });
});

describe('loadConfigFile', () => {
  it('returns null for a missing file', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(loadConfigFile('/nonexistent/grid-defense.json')).toBeNull();
    expect(warn).toHaveBeenCalledWith('[Config] /nonexistent/grid-defense.json not found');
  });

  it('reads a valid file and rejects an invalid one', () => {
    const dir = mkdtempSync(join(tmpdir(), 'grid-config-'));
    try {
      const good = join(dir, 'good.json');
      writeFileSync(good, JSON.stringify({ autoSubmitReports: true }));
      expect(loadConfigFile(good)?.autoSubmitReports).toBe(true);

      const bad = join(dir, 'bad.json');
      writeFileSync(bad, JSON.stringify({ autosaveIntervalTicks: -5 }));
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      expect(loadConfigFile(bad)).toBeNull();
      expect(error).toHaveBeenCalledTimes(1);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

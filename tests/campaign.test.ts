import { describe, it, expect } from 'vitest';
import type { CampaignRun } from '../src/core/types.js';
import {
  abandonLevel,
  applyOutcome,
  evaluateLevel,
  gradeFor,
  isTerminal,
  isVictorySatisfied,
  type VictorySnapshot,
} from '../src/core/campaign.js';
import { parseCampaignLevel } from '../src/config/simulationConfig.js';

const snapshot = (overrides: Partial<VictorySnapshot> = {}): VictorySnapshot => ({
  highestDefenseTier: 2,
  defensePoints: 100,
  riskLevel: 3,
  creditsEarned: 10_000,
  attacksSurvived: 5,
  reportsSent: 1,
  ...overrides,
});

const run = (victory: Record<string, unknown>): CampaignRun => ({
  level: parseCampaignLevel({ id: 2, name: 'Test', victory }),
  insane: false,
  state: { status: 'inProgress', startTick: 0 },
  creditsEarned: 5_000,
  attacksSurvived: 4,
  damageBlocked: 250,
});

const baseVictory = { requiredDefenseTier: 2, requiredDefensePoints: 100, requiredRiskLevel: 3 };

describe('victory conditions', () => {
  it('needs every threshold met', () => {
    const conditions = run(baseVictory).level.victory;
    expect(isVictorySatisfied(conditions, snapshot())).toBe(true);
    expect(isVictorySatisfied(conditions, snapshot({ highestDefenseTier: 1 }))).toBe(false);
    expect(isVictorySatisfied(conditions, snapshot({ defensePoints: 99.9 }))).toBe(false);
    expect(isVictorySatisfied(conditions, snapshot({ riskLevel: 4 }))).toBe(false);
  });

  it('checks optional thresholds only when set', () => {
    const conditions = run({ ...baseVictory, requiredReportsSent: 2, requiredAttacksSurvived: 5 }).level.victory;
    expect(isVictorySatisfied(conditions, snapshot())).toBe(false);
    expect(isVictorySatisfied(conditions, snapshot({ reportsSent: 2 }))).toBe(true);
  });
});

describe('grading', () => {
  it('grades by time against 600 ticks per level id', () => {
    expect(gradeFor(1, 299)).toBe('S');
    expect(gradeFor(1, 300)).toBe('A');
    expect(gradeFor(1, 449)).toBe('A');
    expect(gradeFor(1, 450)).toBe('B');
    expect(gradeFor(1, 599)).toBe('B');
    expect(gradeFor(1, 600)).toBe('C');
    expect(gradeFor(2, 599)).toBe('S');
  });
});

describe('evaluateLevel', () => {
  it('reports victory with completion stats', () => {
    const outcome = evaluateLevel(run(baseVictory), 500, 10, snapshot({ reportsSent: 3 }));
    expect(outcome).toEqual({
      kind: 'victory',
      stats: {
        levelId: 2,
        insane: false,
        ticksToComplete: 500,
        creditsEarned: 5_000,
        attacksSurvived: 4,
        damageBlocked: 250,
        finalDefensePoints: 100,
        reportsSent: 3,
        grade: 'S',
      },
    });
  });

  it('fails past the time limit before checking victory', () => {
    const r = run({ ...baseVictory, timeLimitTicks: 100 });
    expect(evaluateLevel(r, 100, 10, snapshot()).kind).toBe('victory');
    expect(evaluateLevel(r, 101, 10, snapshot())).toEqual({ kind: 'failed', reason: 'timeLimitExceeded' });
  });

  it('tolerates an empty wallet during the grace period', () => {
    const r = run({ ...baseVictory, requiredDefenseTier: 5 });
    expect(evaluateLevel(r, 60, 0, snapshot())).toEqual({ kind: 'continue' });
    expect(evaluateLevel(r, 61, 0, snapshot())).toEqual({ kind: 'failed', reason: 'creditsZero' });
  });

  it('ignores levels that are not in progress', () => {
    const r: CampaignRun = { ...run(baseVictory), state: { status: 'abandoned' } };
    expect(evaluateLevel(r, 10, 10, snapshot())).toEqual({ kind: 'continue' });
  });
});

describe('level state machine', () => {
  it('moves to a terminal state on outcome', () => {
    const r = run(baseVictory);
    expect(applyOutcome(r, { kind: 'continue' })).toBe(r);

    const failed = applyOutcome(r, { kind: 'failed', reason: 'creditsZero' });
    expect(failed.state).toEqual({ status: 'failed', reason: 'creditsZero' });
    expect(isTerminal(failed.state)).toBe(true);
    expect(isTerminal(r.state)).toBe(false);
  });

  it('abandons or quits in-progress levels only', () => {
    const r = run(baseVictory);
    expect(abandonLevel(r).state).toEqual({ status: 'abandoned' });
    expect(abandonLevel(r, 'userQuit').state).toEqual({ status: 'failed', reason: 'userQuit' });

    const won = applyOutcome(r, evaluateLevel(r, 10, 10, snapshot()));
    expect(abandonLevel(won)).toBe(won);
  });
});

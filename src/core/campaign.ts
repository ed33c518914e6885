import type {
  CampaignRun,
  FailureReason,
  LevelCompletionStats,
  LevelGrade,
  LevelState,
  VictoryConditions,
} from './types.js';

// ─── Victory predicate ─────────────────────────────────────────────────────

/** Read-only view of a run, as the victory check sees it. */
export interface VictorySnapshot {
  highestDefenseTier: number;
  defensePoints: number;
  /** Effective (display) risk level */
  riskLevel: number;
  creditsEarned: number;
  attacksSurvived: number;
  reportsSent: number;
}

export function isVictorySatisfied(conditions: VictoryConditions, snap: VictorySnapshot): boolean {
  if (snap.highestDefenseTier < conditions.requiredDefenseTier) return false;
  if (Math.floor(snap.defensePoints) < conditions.requiredDefensePoints) return false;
  if (snap.riskLevel > conditions.requiredRiskLevel) return false;
  if (conditions.requiredCredits !== undefined && snap.creditsEarned < conditions.requiredCredits) return false;
  if (conditions.requiredAttacksSurvived !== undefined && snap.attacksSurvived < conditions.requiredAttacksSurvived) {
    return false;
  }
  if (conditions.requiredReportsSent !== undefined && snap.reportsSent < conditions.requiredReportsSent) return false;
  return true;
}

export function isTimeLimitExceeded(conditions: VictoryConditions, ticksElapsed: number): boolean {
  return conditions.timeLimitTicks !== undefined && ticksElapsed > conditions.timeLimitTicks;
}

// ─── Grading ───────────────────────────────────────────────────────────────

const EXPECTED_TICKS_PER_LEVEL = 600;

/** S/A/B/C by completion time against 600 ticks per level id. */
export function gradeFor(levelId: number, ticksToComplete: number): LevelGrade {
  const ratio = ticksToComplete / (EXPECTED_TICKS_PER_LEVEL * levelId);
  if (ratio < 0.5) return 'S';
  if (ratio < 0.75) return 'A';
  if (ratio < 1) return 'B';
  return 'C';
}

// ─── Level state machine ───────────────────────────────────────────────────

/** Ticks at the start of a level during which an empty wallet is tolerated. */
export const BANKRUPTCY_GRACE_TICKS = 60;

export function isTerminal(state: LevelState): boolean {
  return state.status === 'victory' || state.status === 'failed' || state.status === 'abandoned';
}

export type LevelOutcome =
  | { kind: 'continue' }
  | { kind: 'victory'; stats: LevelCompletionStats }
  | { kind: 'failed'; reason: FailureReason };

/**
 * Decide whether an in-progress level ends this tick. Failure checks run
 * before victory: time limit, then bankruptcy.
 */
export function evaluateLevel(
  run: CampaignRun,
  currentTick: number,
  credits: number,
  snap: VictorySnapshot,
): LevelOutcome {
  if (run.state.status !== 'inProgress') return { kind: 'continue' };
  const elapsed = currentTick - run.state.startTick;
  const conditions = run.level.victory;

  if (isTimeLimitExceeded(conditions, elapsed)) return { kind: 'failed', reason: 'timeLimitExceeded' };
  if (credits <= 0 && elapsed > BANKRUPTCY_GRACE_TICKS) return { kind: 'failed', reason: 'creditsZero' };

  if (isVictorySatisfied(conditions, snap)) {
    return {
      kind: 'victory',
      stats: {
        levelId: run.level.id,
        insane: run.insane,
        ticksToComplete: elapsed,
        creditsEarned: run.creditsEarned,
        attacksSurvived: run.attacksSurvived,
        damageBlocked: run.damageBlocked,
        finalDefensePoints: Math.floor(snap.defensePoints),
        reportsSent: snap.reportsSent,
        grade: gradeFor(run.level.id, elapsed),
      },
    };
  }
  return { kind: 'continue' };
}

export function applyOutcome(run: CampaignRun, outcome: LevelOutcome): CampaignRun {
  switch (outcome.kind) {
    case 'continue':
      return run;
    case 'victory':
      return { ...run, state: { status: 'victory', stats: outcome.stats } };
    case 'failed':
      return { ...run, state: { status: 'failed', reason: outcome.reason } };
  }
}

/** Abandon or quit an in-progress level; terminal states are left alone. */
export function abandonLevel(run: CampaignRun, reason: 'abandoned' | 'userQuit' = 'abandoned'): CampaignRun {
  if (isTerminal(run.state)) return run;
  return {
    ...run,
    state: reason === 'userQuit' ? { status: 'failed', reason: 'userQuit' } : { status: 'abandoned' },
  };
}

import type { IntelLedger, IntelMilestone, MilestoneBonusKind, ReportResult } from './types.js';
import type { Rng } from './rng.js';
import { INTEL_MILESTONES } from '../content/milestones.js';

// ─── Intelligence ledger ───────────────────────────────────────────────────

const REPORT_BASE_COST = 200;
const REPORT_COST_STEP = 0.05;
const REPORT_BASE_REWARD = 100;
const REWARD_PER_PATTERN = 10;
const FOOTPRINT_FOR_FULL_ANALYSIS = 500;

export function createIntelLedger(): IntelLedger {
  return {
    footprintData: 0,
    analysisProgress: 0,
    patternsIdentified: 0,
    knownSignatures: [],
    reportsSent: 0,
    claimedMilestones: [],
    originDiscovered: false,
    totalIntelCredits: 0,
  };
}

/** Sum of the permanent bonuses of one kind from claimed milestones. */
export function milestoneBonus(ledger: IntelLedger, kind: MilestoneBonusKind): number {
  return INTEL_MILESTONES.reduce(
    (sum, m) => (m.bonus.kind === kind && ledger.claimedMilestones.includes(m.id) ? sum + m.bonus.value : sum),
    0,
  );
}

export const intelCollectionBonus = (l: IntelLedger): number => milestoneBonus(l, 'intelCollectionRate');
export const patternSpeedBonus = (l: IntelLedger): number => milestoneBonus(l, 'patternIdSpeed');
export const attackWarningChance = (l: IntelLedger): number => milestoneBonus(l, 'attackWarning');
export const intelDamageReduction = (l: IntelLedger): number => milestoneBonus(l, 'damageReduction');
/** Reported for display; attack generation is driven by raw threat level. */
export const intelFrequencyReduction = (l: IntelLedger): number => milestoneBonus(l, 'attackFrequencyReduction');

/**
 * Add footprint evidence. Detection from the defense stack and claimed
 * collection bonuses both amplify it.
 */
export function addFootprintData(ledger: IntelLedger, amount: number, detectionBonus = 0): IntelLedger {
  const gained = Math.max(0, amount) * (1 + detectionBonus + intelCollectionBonus(ledger));
  const footprintData = ledger.footprintData + gained;
  return {
    ...ledger,
    footprintData,
    analysisProgress: Math.min(100, (footprintData / FOOTPRINT_FOR_FULL_ANALYSIS) * 100),
  };
}

/**
 * Record a newly seen attack signature. With chance `speedBonus` a variant is
 * recorded as well. Known signatures are ignored without consuming a draw.
 */
export function identifyPattern(ledger: IntelLedger, pattern: string, speedBonus: number, rng: Rng): IntelLedger {
  if (ledger.knownSignatures.includes(pattern)) return ledger;

  const knownSignatures = [...ledger.knownSignatures, pattern];
  let patternsIdentified = ledger.patternsIdentified + 1;

  if (speedBonus > 0 && rng.next() < speedBonus) {
    const variant = `${pattern}_variant`;
    if (!knownSignatures.includes(variant)) {
      knownSignatures.push(variant);
      patternsIdentified += 1;
    }
  }
  return { ...ledger, knownSignatures, patternsIdentified };
}

export function reportCost(ledger: IntelLedger): number {
  return REPORT_BASE_COST * (1 + REPORT_COST_STEP * ledger.reportsSent);
}

export function canSendReport(ledger: IntelLedger): boolean {
  return ledger.footprintData >= reportCost(ledger);
}

/**
 * Spend footprint on a report. Null when footprint is short of the cost.
 * Claims at most one milestone: the first unclaimed one now within reach.
 */
export function sendReport(
  ledger: IntelLedger,
  intelMultiplier = 1,
): { ledger: IntelLedger; result: ReportResult } | null {
  if (!canSendReport(ledger)) return null;

  const cost = reportCost(ledger);
  const reportsSent = ledger.reportsSent + 1;
  const baseCredits = (REPORT_BASE_REWARD + REWARD_PER_PATTERN * ledger.patternsIdentified) * intelMultiplier;

  const milestone =
    INTEL_MILESTONES.find((m) => reportsSent >= m.reportsRequired && !ledger.claimedMilestones.includes(m.id)) ??
    null;
  const milestoneCredits = milestone ? milestone.creditReward : 0;
  const creditsEarned = baseCredits + milestoneCredits;

  return {
    ledger: {
      ...ledger,
      footprintData: ledger.footprintData - cost,
      reportsSent,
      claimedMilestones: milestone ? [...ledger.claimedMilestones, milestone.id] : ledger.claimedMilestones,
      originDiscovered: ledger.originDiscovered || milestone?.id === 'originDiscovery',
      totalIntelCredits: ledger.totalIntelCredits + creditsEarned,
    },
    result: { creditsEarned, baseCredits, milestoneCredits, milestone, reportNumber: reportsSent },
  };
}

export function nextMilestone(ledger: IntelLedger): IntelMilestone | null {
  return INTEL_MILESTONES.find((m) => !ledger.claimedMilestones.includes(m.id)) ?? null;
}

export function reportsToNextMilestone(ledger: IntelLedger): number | null {
  const next = nextMilestone(ledger);
  return next ? Math.max(0, next.reportsRequired - ledger.reportsSent) : null;
}

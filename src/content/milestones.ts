import type { IntelMilestone } from '../core/types.js';

/** Ordered by report threshold; at most one is claimed per report. */
export const INTEL_MILESTONES: IntelMilestone[] = [
  {
    id: 'firstReport',
    name: 'First Contact',
    reportsRequired: 1,
    creditReward: 1_000,
    bonus: { kind: 'intelCollectionRate', value: 0.10 },
  },
  {
    id: 'patternAnalyst',
    name: 'Pattern Analyst',
    reportsRequired: 3,
    creditReward: 5_000,
    bonus: { kind: 'patternIdSpeed', value: 0.25 },
  },
  {
    id: 'signatureExpert',
    name: 'Signature Expert',
    reportsRequired: 5,
    creditReward: 15_000,
    bonus: { kind: 'intelCollectionRate', value: 0.15 },
  },
  {
    id: 'threatHunter',
    name: 'Threat Hunter',
    reportsRequired: 10,
    creditReward: 50_000,
    bonus: { kind: 'attackWarning', value: 0.20 },
  },
  {
    id: 'adversaryTracker',
    name: 'Adversary Tracker',
    reportsRequired: 15,
    creditReward: 100_000,
    bonus: { kind: 'damageReduction', value: 0.05 },
  },
  {
    id: 'originDiscovery',
    name: 'Origin Discovery',
    reportsRequired: 20,
    creditReward: 250_000,
    bonus: { kind: 'intelCollectionRate', value: 0.25 },
  },
  {
    id: 'counterIntel',
    name: 'Counter-Intelligence',
    reportsRequired: 25,
    creditReward: 500_000,
    bonus: { kind: 'attackFrequencyReduction', value: 0.10 },
  },
];

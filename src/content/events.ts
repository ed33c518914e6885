import type { RandomEventType } from '../core/types.js';

export type EventPolarity = 'positive' | 'negative';

export interface RandomEventDefinition {
  type: RandomEventType;
  name: string;
  polarity: EventPolarity;
  /** Ticks the multipliers stay in force; 0 for one-shot events */
  duration: number;
  sourceMultiplier: number;
  bandwidthMultiplier: number;
  creditMultiplier: number;
  /** Share of lifetime credits paid out once, with a floor of 50 */
  instantCreditShare: number;
  /** Share of the sink buffer lost once */
  dataLoss: number;
}

function def(
  type: RandomEventType,
  name: string,
  polarity: EventPolarity,
  duration: number,
  effects: Partial<
    Pick<RandomEventDefinition, 'sourceMultiplier' | 'bandwidthMultiplier' | 'creditMultiplier' | 'instantCreditShare' | 'dataLoss'>
  >,
): RandomEventDefinition {
  return {
    type,
    name,
    polarity,
    duration,
    sourceMultiplier: effects.sourceMultiplier ?? 1,
    bandwidthMultiplier: effects.bandwidthMultiplier ?? 1,
    creditMultiplier: effects.creditMultiplier ?? 1,
    instantCreditShare: effects.instantCreditShare ?? 0,
    dataLoss: effects.dataLoss ?? 0,
  };
}

/** Order within each polarity is significant: the type draw indexes into it. */
export const RANDOM_EVENTS: RandomEventDefinition[] = [
  def('dataSurge', 'Data Surge', 'positive', 30, { sourceMultiplier: 1.5 }),
  def('clearChannel', 'Clear Channel', 'positive', 25, { bandwidthMultiplier: 1.75 }),
  def('marketSpike', 'Market Spike', 'positive', 20, { creditMultiplier: 2 }),
  def('luckyFind', 'Lucky Find', 'positive', 0, { instantCreditShare: 0.1 }),
  def('shadowContact', 'Shadow Contact', 'positive', 0, {}),
  def('networkGlitch', 'Network Glitch', 'negative', 15, { sourceMultiplier: 0.5 }),
  def('congestion', 'Congestion', 'negative', 20, { bandwidthMultiplier: 0.5 }),
  def('marketCrash', 'Market Crash', 'negative', 15, { creditMultiplier: 0.5 }),
  def('dataCorruption', 'Data Corruption', 'negative', 0, { dataLoss: 0.25 }),
];

export const RANDOM_EVENT_MAP: Record<string, RandomEventDefinition> = Object.fromEntries(
  RANDOM_EVENTS.map((e) => [e.type, e]),
);

export const POSITIVE_EVENTS: RandomEventType[] = RANDOM_EVENTS.filter((e) => e.polarity === 'positive').map((e) => e.type);
export const NEGATIVE_EVENTS: RandomEventType[] = RANDOM_EVENTS.filter((e) => e.polarity === 'negative').map((e) => e.type);

/**
 * Polarity weights by threat band. Whatever share is left over is quiet:
 * the roll lands but nothing happens.
 */
export const EVENT_WEIGHT_BANDS: { minThreatLevel: number; positive: number; negative: number }[] = [
  { minThreatLevel: 17, positive: 0.05, negative: 0.6 },
  { minThreatLevel: 14, positive: 0.1, negative: 0.55 },
  { minThreatLevel: 11, positive: 0.15, negative: 0.5 },
  { minThreatLevel: 7, positive: 0.2, negative: 0.45 },
  { minThreatLevel: 5, positive: 0.3, negative: 0.4 },
  { minThreatLevel: 3, positive: 0.4, negative: 0.35 },
  { minThreatLevel: 1, positive: 0.6, negative: 0.2 },
];

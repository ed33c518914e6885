import type { RandomEvent, RandomEventType, SinkNode } from './types.js';
import type { Rng } from './rng.js';
import {
  EVENT_WEIGHT_BANDS,
  NEGATIVE_EVENTS,
  POSITIVE_EVENTS,
  RANDOM_EVENT_MAP,
  type RandomEventDefinition,
} from '../content/events.js';

// ─── Event roll ────────────────────────────────────────────────────────────

const BASE_EVENT_CHANCE = 0.02;
const MIN_LUCKY_FIND = 50;

/** Per-tick event chance: 2%, plus a tenth of that per threat level. */
export function eventChance(threatLevel: number): number {
  return BASE_EVENT_CHANCE * (1 + 0.1 * threatLevel);
}

export function eventWeights(threatLevel: number): { positive: number; negative: number } {
  const band = EVENT_WEIGHT_BANDS.find((b) => threatLevel >= b.minThreatLevel);
  return band ? { positive: band.positive, negative: band.negative } : { positive: 0.6, negative: 0.2 };
}

/**
 * Pick polarity from the threat band, then a type uniformly within it.
 * A roll in the quiet share yields null and draws nothing more.
 */
export function pickEventType(threatLevel: number, rng: Rng): RandomEventType | null {
  const { positive, negative } = eventWeights(threatLevel);
  const roll = rng.next();
  if (roll < positive) return POSITIVE_EVENTS[rng.nextInt(POSITIVE_EVENTS.length)] ?? null;
  if (roll < positive + negative) return NEGATIVE_EVENTS[rng.nextInt(NEGATIVE_EVENTS.length)] ?? null;
  return null;
}

export function tryGenerateEvent(threatLevel: number, currentTick: number, rng: Rng): RandomEvent | null {
  if (rng.next() >= eventChance(threatLevel)) return null;
  const type = pickEventType(threatLevel, rng);
  if (!type) return null;
  return { type, startTick: currentTick, duration: RANDOM_EVENT_MAP[type].duration };
}

// ─── Effects ───────────────────────────────────────────────────────────────

export function eventDefinition(event: RandomEvent): RandomEventDefinition {
  return RANDOM_EVENT_MAP[event.type];
}

export function isTimedEvent(event: RandomEvent): boolean {
  return event.duration > 0;
}

/** A timed event is in force from its start tick for `duration` ticks. */
export function isEventExpired(event: RandomEvent, currentTick: number): boolean {
  return currentTick >= event.startTick + event.duration;
}

export interface EventModifiers {
  source: number;
  bandwidth: number;
  credit: number;
}

export const NEUTRAL_EVENT_MODIFIERS: EventModifiers = { source: 1, bandwidth: 1, credit: 1 };

export function eventModifiers(event: RandomEvent | null): EventModifiers {
  if (!event) return NEUTRAL_EVENT_MODIFIERS;
  const def = eventDefinition(event);
  return { source: def.sourceMultiplier, bandwidth: def.bandwidthMultiplier, credit: def.creditMultiplier };
}

/** One-shot payout; a tenth of lifetime credits for a lucky find, never below 50. */
export function instantEventCredits(event: RandomEvent, lifetimeCredits: number): number {
  const share = eventDefinition(event).instantCreditShare;
  if (share <= 0) return 0;
  return Math.max(MIN_LUCKY_FIND, lifetimeCredits * share);
}

export function applyDataLoss(sink: SinkNode, event: RandomEvent): SinkNode {
  const loss = eventDefinition(event).dataLoss;
  if (loss <= 0) return sink;
  return { ...sink, inputBuffer: sink.inputBuffer * (1 - loss) };
}

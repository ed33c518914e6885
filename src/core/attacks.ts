import type { Attack, DamageEnvelope } from './types.js';
import type { Rng } from './rng.js';
import { ATTACK_TYPES, ATTACK_TYPE_MAP, type AttackTypeDefinition } from '../content/attackTypes.js';
import { attackChancePercent, severityMultiplier } from './threat.js';

// ─── Attack generation ─────────────────────────────────────────────────────

export interface GenerationTuning {
  /** 0–1 share of the attack chance removed */
  frequencyReduction?: number;
  /** Scales the attack chance (insane mode, hostile levels) */
  frequencyMultiplier?: number;
  /** Floor on the effective chance, in percent */
  minimumChance?: number;
}

/** Percent chance (0–100) an attack starts this tick. */
export function effectiveAttackChance(threatLevel: number, tuning: GenerationTuning = {}): number {
  const { frequencyReduction = 0, frequencyMultiplier = 1, minimumChance = 0 } = tuning;
  const reduction = Math.min(1, Math.max(0, frequencyReduction));
  const scaled = attackChancePercent(threatLevel) * frequencyMultiplier * (1 - reduction);
  return Math.max(scaled, minimumChance);
}

export function eligibleAttackTypes(threatLevel: number): AttackTypeDefinition[] {
  return ATTACK_TYPES.filter((t) => threatLevel >= t.minThreatLevel);
}

/**
 * Weighted pick: draw an integer in [0, total) and walk the list subtracting
 * weights until the remainder goes negative.
 */
export function pickAttackType(candidates: AttackTypeDefinition[], draw: number): AttackTypeDefinition | null {
  let remaining = draw;
  for (const candidate of candidates) {
    remaining -= candidate.weight;
    if (remaining < 0) return candidate;
  }
  return null;
}

/**
 * Roll for a new attack. Draw order: chance roll, then (on success) the type
 * draw, then the severity jitter.
 */
export function tryGenerateAttack(
  threatLevel: number,
  currentTick: number,
  rng: Rng,
  tuning: GenerationTuning = {},
): Attack | null {
  const chance = effectiveAttackChance(threatLevel, tuning);
  const roll = rng.next() * 100;
  if (roll >= chance) return null;

  const candidates = eligibleAttackTypes(threatLevel);
  if (candidates.length === 0) return null;

  const totalWeight = candidates.reduce((sum, c) => sum + c.weight, 0);
  const picked = pickAttackType(candidates, rng.nextInt(totalWeight));
  if (!picked) return null;

  const severity = severityMultiplier(threatLevel) * rng.nextFloat(0.8, 1.2);
  return createAttack(picked, severity, currentTick);
}

export function createAttack(def: AttackTypeDefinition, severity: number, startTick: number): Attack {
  return {
    id: `atk-${startTick}-${def.type}`,
    type: def.type,
    severity,
    startTick,
    duration: def.baseDuration,
    ticksRemaining: def.baseDuration,
    damageDealt: 0,
    blocked: 0,
  };
}

// ─── Lifecycle ─────────────────────────────────────────────────────────────

export function isAttackActive(attack: Attack): boolean {
  return attack.ticksRemaining > 0;
}

export function tickAttack(attack: Attack, steps = 1): Attack {
  return { ...attack, ticksRemaining: Math.max(0, attack.ticksRemaining - steps) };
}

// ─── Damage ────────────────────────────────────────────────────────────────

/**
 * Scale factor for credit drain: 1.0 up to 10 credits/tick of income, rising
 * linearly to 30.7 at 1000+. Blends a flat floor with income-proportional damage.
 */
export function incomeDamageScale(incomePerTick: number): number {
  const incomeScale = Math.min(100, Math.max(1, incomePerTick / 10));
  return 0.7 + 0.3 * incomeScale;
}

const clamp01 = (v: number): number => Math.min(1, Math.max(0, v));

export function damagePerTick(attack: Attack, incomePerTick: number): DamageEnvelope {
  const def = ATTACK_TYPE_MAP[attack.type];
  const s = attack.severity;
  return {
    creditDrain: def.creditDrain * s * incomeDamageScale(incomePerTick),
    bandwidthReduction: clamp01(def.bandwidthReduction * s),
    nodeDisableChance: clamp01(def.nodeDisableChance * s),
    processingReduction: clamp01(def.processingReduction * s),
  };
}

/** Campaign damage multiplier: drain scales freely, percentages stay within 0–1. */
export function amplifyDamage(damage: DamageEnvelope, multiplier: number): DamageEnvelope {
  if (multiplier === 1) return damage;
  return {
    creditDrain: damage.creditDrain * multiplier,
    bandwidthReduction: clamp01(damage.bandwidthReduction * multiplier),
    nodeDisableChance: clamp01(damage.nodeDisableChance * multiplier),
    processingReduction: clamp01(damage.processingReduction * multiplier),
  };
}

export function attackPatternSignature(attack: Attack): string {
  return `${attack.type}_v${Math.floor(attack.severity * 10)}`;
}

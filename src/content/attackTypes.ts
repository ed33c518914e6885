import type { AttackType } from '../core/types.js';

export interface AttackTypeDefinition {
  type: AttackType;
  name: string;
  /** Lowest threat level at which this attack can be drawn */
  minThreatLevel: number;
  /** Relative draw weight among eligible types */
  weight: number;
  /** Ticks the attack stays active */
  baseDuration: number;
  /** Per-tick credit drain before severity and income scaling */
  creditDrain: number;
  /** Per-tick 0–1 effects before severity scaling */
  bandwidthReduction: number;
  nodeDisableChance: number;
  processingReduction: number;
}

function def(
  type: AttackType,
  name: string,
  minThreatLevel: number,
  weight: number,
  baseDuration: number,
  effects: Partial<Pick<AttackTypeDefinition, 'creditDrain' | 'bandwidthReduction' | 'nodeDisableChance' | 'processingReduction'>>,
): AttackTypeDefinition {
  return {
    type,
    name,
    minThreatLevel,
    weight,
    baseDuration,
    creditDrain: effects.creditDrain ?? 0,
    bandwidthReduction: effects.bandwidthReduction ?? 0,
    nodeDisableChance: effects.nodeDisableChance ?? 0,
    processingReduction: effects.processingReduction ?? 0,
  };
}

/** Catalog order is significant: weighted draws walk it front to back. */
export const ATTACK_TYPES: AttackTypeDefinition[] = [
  def('probe', 'Port Probe', 2, 50, 3, { creditDrain: 5 }),
  def('ddos', 'DDoS Flood', 3, 30, 8, { bandwidthReduction: 0.3 }),
  def('intrusion', 'Intrusion', 4, 15, 5, { creditDrain: 20, nodeDisableChance: 0.1 }),
  def('apexStrike', 'Apex Strike', 6, 5, 15, { creditDrain: 50, bandwidthReduction: 0.5, nodeDisableChance: 0.2 }),
  def('coordinatedAssault', 'Coordinated Assault', 8, 8, 20, {
    creditDrain: 100, bandwidthReduction: 0.4, nodeDisableChance: 0.15, processingReduction: 0.3,
  }),
  def('neuralHijack', 'Neural Hijack', 9, 4, 12, { creditDrain: 75, nodeDisableChance: 0.3, processingReduction: 0.5 }),
  def('quantumBreach', 'Quantum Breach', 10, 2, 25, {
    creditDrain: 200, bandwidthReduction: 0.6, nodeDisableChance: 0.25, processingReduction: 0.4,
  }),
  def('symbioticInvasion', 'Symbiotic Invasion', 11, 6, 18, {
    creditDrain: 300, bandwidthReduction: 0.5, nodeDisableChance: 0.35, processingReduction: 0.45,
  }),
  def('voidRift', 'Void Rift', 13, 4, 22, {
    creditDrain: 400, bandwidthReduction: 0.65, nodeDisableChance: 0.3, processingReduction: 0.5,
  }),
  def('dimensionalTear', 'Dimensional Tear', 14, 5, 30, {
    creditDrain: 500, bandwidthReduction: 0.7, nodeDisableChance: 0.4, processingReduction: 0.55,
  }),
  def('causalityLoop', 'Causality Loop', 15, 3, 28, {
    creditDrain: 600, bandwidthReduction: 0.5, nodeDisableChance: 0.45, processingReduction: 0.6,
  }),
  def('timelineCollapse', 'Timeline Collapse', 16, 2, 35, {
    creditDrain: 800, bandwidthReduction: 0.75, nodeDisableChance: 0.5, processingReduction: 0.65,
  }),
  def('singularityBomb', 'Singularity Bomb', 17, 2, 40, {
    creditDrain: 1000, bandwidthReduction: 0.8, nodeDisableChance: 0.55, processingReduction: 0.7,
  }),
  def('realityUnravel', 'Reality Unravel', 18, 1, 45, {
    creditDrain: 1500, bandwidthReduction: 0.85, nodeDisableChance: 0.6, processingReduction: 0.75,
  }),
  def('omegaStrike', 'Omega Strike', 19, 1, 50, {
    creditDrain: 2000, bandwidthReduction: 0.9, nodeDisableChance: 0.7, processingReduction: 0.8,
  }),
  def('existentialThreat', 'Existential Threat', 20, 1, 60, {
    creditDrain: 5000, bandwidthReduction: 0.95, nodeDisableChance: 0.8, processingReduction: 0.9,
  }),
];

export const ATTACK_TYPE_MAP: Record<string, AttackTypeDefinition> = Object.fromEntries(
  ATTACK_TYPES.map((a) => [a.type, a]),
);

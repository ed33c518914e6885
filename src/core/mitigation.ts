import type { DamageEnvelope, FirewallNode } from './types.js';
import { absorbDamage } from './firewall.js';

// ─── Mitigation chain ──────────────────────────────────────────────────────
//
//   credit drain ─▶ firewall absorb ─▶ × (1 − stack %) ─▶ × (1 − net-defense %)
//
// Each percentage layer applies to what the previous layer let through, so
// the layers compound rather than add. Their combined effect is capped.

/** Percentage layers never remove more than this share of post-firewall damage. */
export const MAX_PERCENT_MITIGATION = 0.85;

export interface MitigationLayers {
  firewall: FirewallNode | null;
  /** 0–1, already capped by the stack's tier band */
  stackReduction: number;
  /** 0–1, from the net defense level */
  netDefenseReduction: number;
}

export interface MitigationResult {
  firewall: FirewallNode | null;
  /** Damage left after every layer */
  damage: DamageEnvelope;
  absorbedByFirewall: number;
  /** Credit drain removed by the firewall's own reduction plus its health */
  firewallMitigated: number;
  /** Credit drain removed by the percentage layers */
  percentMitigated: number;
}

export function combinedPercentReduction(stackReduction: number, netDefenseReduction: number): number {
  const stack = Math.min(1, Math.max(0, stackReduction));
  const net = Math.min(1, Math.max(0, netDefenseReduction));
  return Math.min(MAX_PERCENT_MITIGATION, 1 - (1 - stack) * (1 - net));
}

export function mitigate(damage: DamageEnvelope, layers: MitigationLayers): MitigationResult {
  let firewall = layers.firewall;
  let drain = damage.creditDrain;
  let absorbedByFirewall = 0;

  if (firewall) {
    const absorbed = absorbDamage(firewall, drain);
    firewall = absorbed.firewall;
    absorbedByFirewall = absorbed.absorbed;
    drain = absorbed.passThrough;
  }
  const firewallMitigated = damage.creditDrain - drain;

  const keep = 1 - combinedPercentReduction(layers.stackReduction, layers.netDefenseReduction);
  const finalDrain = drain * keep;

  return {
    firewall,
    damage: {
      creditDrain: finalDrain,
      bandwidthReduction: damage.bandwidthReduction * keep,
      nodeDisableChance: damage.nodeDisableChance * keep,
      processingReduction: damage.processingReduction * keep,
    },
    absorbedByFirewall,
    firewallMitigated,
    percentMitigated: drain - finalDrain,
  };
}

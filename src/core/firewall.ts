import type { FirewallNode } from './types.js';
import { nodeUpgradeCost } from './nodes.js';
import { tierForValue } from './tiers.js';

// ─── Perimeter firewall ────────────────────────────────────────────────────

export function firewallMaxHealth(fw: FirewallNode): number {
  return fw.baseHealth * fw.level * 1.5;
}

export function firewallDamageReduction(fw: FirewallNode): number {
  return Math.min(0.6, fw.baseDamageReduction + fw.level * 0.05);
}

export function firewallRegenPerTick(fw: FirewallNode): number {
  return firewallMaxHealth(fw) * 0.02 * fw.level;
}

export function firewallTier(fw: FirewallNode): number {
  return tierForValue('firewall', fw.baseHealth);
}

export function firewallUpgradeCost(fw: FirewallNode): number {
  return nodeUpgradeCost(50, fw.level);
}

export function isDestroyed(fw: FirewallNode): boolean {
  return fw.currentHealth <= 0;
}

export function healthPercentage(fw: FirewallNode): number {
  const max = firewallMaxHealth(fw);
  return max > 0 ? fw.currentHealth / max : 0;
}

export interface AbsorbResult {
  firewall: FirewallNode;
  absorbed: number;
  passThrough: number;
}

/**
 * Reduce incoming damage by the firewall's flat percentage, then soak as much
 * of the remainder as health allows. A destroyed firewall passes damage
 * through unreduced.
 */
export function absorbDamage(fw: FirewallNode, damage: number): AbsorbResult {
  const incoming = Math.max(0, damage);
  if (isDestroyed(fw)) {
    return { firewall: fw, absorbed: 0, passThrough: incoming };
  }
  const reduced = incoming * (1 - firewallDamageReduction(fw));
  const absorbed = Math.min(fw.currentHealth, reduced);
  return {
    firewall: { ...fw, currentHealth: fw.currentHealth - absorbed },
    absorbed,
    passThrough: reduced - absorbed,
  };
}

export function regenerate(fw: FirewallNode): FirewallNode {
  const max = firewallMaxHealth(fw);
  const missing = Math.max(0, max - fw.currentHealth);
  return { ...fw, currentHealth: fw.currentHealth + Math.min(missing, firewallRegenPerTick(fw)) };
}

/** Restore `fraction` of max health (automation-driven repair). */
export function restoreHealth(fw: FirewallNode, fraction: number): FirewallNode {
  const max = firewallMaxHealth(fw);
  return { ...fw, currentHealth: Math.min(max, fw.currentHealth + max * Math.max(0, fraction)) };
}

export function repairCost(fw: FirewallNode): number {
  return Math.max(0, firewallMaxHealth(fw) - fw.currentHealth) * 0.5;
}

export function repair(fw: FirewallNode): FirewallNode {
  return { ...fw, currentHealth: firewallMaxHealth(fw) };
}

/** Level up and heal to the new maximum. */
export function upgradeFirewall(fw: FirewallNode): FirewallNode {
  const next = { ...fw, level: fw.level + 1 };
  return { ...next, currentHealth: firewallMaxHealth(next) };
}

import type { DefenseCategory, FailureReason, GameState, ReportResult, UnitKind } from '../core/types.js';
import { createFirewallNode, createLinkNode, createSinkNode, createSourceNode } from './gameState.js';
import { DEFENSE_APP_MAP, MAX_TIER, UNIT_MAP, defenseAppId } from '../content/catalog.js';
import {
  isAtMaxLevel,
  linkTier,
  linkUpgradeCost,
  sinkCapacity,
  sinkTier,
  sinkUpgradeCost,
  sourceTier,
  sourceUpgradeCost,
} from '../core/nodes.js';
import { firewallTier, firewallUpgradeCost, repair, repairCost, upgradeFirewall } from '../core/firewall.js';
import { appUpgradeCost, canUnlock, deployApp, totalIntelMultiplier, unlockApp, upgradeApp } from '../core/defenseStack.js';
import { sendReport } from '../core/intel.js';
import { abandonLevel } from '../core/campaign.js';
import { applyPrestige } from '../core/prestige.js';

// ─── Re-export helpers ─────────────────────────────────────────────────────

export { applyPrestige };

/** Highest unit or app tier the current run may use. */
export function maxAvailableTier(state: GameState): number {
  return state.campaign ? state.campaign.level.availableTiers : MAX_TIER;
}

// ─── Node upgrades ─────────────────────────────────────────────────────────

/** Tier and level of the node in a slot; null for an empty firewall slot. */
export function equippedNode(state: GameState, kind: UnitKind): { tier: number; level: number } | null {
  const { source, link, sink, firewall } = state.pipeline;
  switch (kind) {
    case 'source':
      return { tier: sourceTier(source), level: source.level };
    case 'link':
      return { tier: linkTier(link), level: link.level };
    case 'sink':
      return { tier: sinkTier(sink), level: sink.level };
    case 'firewall':
      return firewall ? { tier: firewallTier(firewall), level: firewall.level } : null;
  }
}

/** Cost of the next level; null when the slot is empty or already maxed. */
export function upgradeCostFor(state: GameState, kind: UnitKind): number | null {
  const node = equippedNode(state, kind);
  if (!node || isAtMaxLevel(node.level, node.tier)) return null;

  const { source, link, sink, firewall } = state.pipeline;
  switch (kind) {
    case 'source':
      return sourceUpgradeCost(source);
    case 'link':
      return linkUpgradeCost(link);
    case 'sink':
      return sinkUpgradeCost(sink);
    case 'firewall':
      return firewall ? firewallUpgradeCost(firewall) : null;
  }
}

/**
 * Raise a node one level.
 * Returns null if the slot is empty, the node is maxed, or credits are short.
 */
export function upgradeNode(state: GameState, kind: UnitKind): GameState | null {
  const cost = upgradeCostFor(state, kind);
  if (cost === null || state.credits < cost) return null;

  const p = state.pipeline;
  const pipeline = { ...p };
  switch (kind) {
    case 'source':
      pipeline.source = { ...p.source, level: p.source.level + 1 };
      break;
    case 'link':
      pipeline.link = { ...p.link, level: p.link.level + 1 };
      break;
    case 'sink':
      pipeline.sink = { ...p.sink, level: p.sink.level + 1 };
      break;
    case 'firewall':
      if (!p.firewall) return null;
      pipeline.firewall = upgradeFirewall(p.firewall);
      break;
  }
  return { ...state, credits: state.credits - cost, pipeline };
}

// ─── Unit unlock / equip ───────────────────────────────────────────────────

/**
 * Unlock a higher-tier unit. Needs the slot's current node at the previous
 * tier and at that tier's max level; the first firewall has no prerequisite.
 */
export function unlockUnit(state: GameState, unitId: string): GameState | null {
  const def = UNIT_MAP[unitId];
  if (!def || state.unlockedUnits.includes(unitId)) return null;
  if (def.tier > maxAvailableTier(state)) return null;
  if (state.credits < def.unlockCost) return null;

  if (def.tier > 1) {
    const current = equippedNode(state, def.kind);
    if (!current || current.tier !== def.tier - 1) return null;
    if (!isAtMaxLevel(current.level, current.tier)) return null;
  }

  return {
    ...state,
    credits: state.credits - def.unlockCost,
    unlockedUnits: [...state.unlockedUnits, unitId],
  };
}

/** Swap in a fresh level-1 node for an unlocked unit. */
export function equipUnit(state: GameState, unitId: string): GameState | null {
  const def = UNIT_MAP[unitId];
  if (!def || !state.unlockedUnits.includes(unitId)) return null;

  const p = state.pipeline;
  switch (def.kind) {
    case 'source':
      if (p.source.unitId === unitId) return null;
      return { ...state, pipeline: { ...p, source: createSourceNode(def.tier) } };
    case 'link':
      if (p.link.unitId === unitId) return null;
      return { ...state, pipeline: { ...p, link: createLinkNode(def.tier) } };
    case 'sink': {
      if (p.sink.unitId === unitId) return null;
      const fresh = createSinkNode(def.tier);
      // Buffered data carries over, up to the new node's capacity
      const sink = { ...fresh, inputBuffer: Math.min(p.sink.inputBuffer, sinkCapacity(fresh)) };
      return { ...state, pipeline: { ...p, sink } };
    }
    case 'firewall':
      if (p.firewall?.unitId === unitId) return null;
      return { ...state, pipeline: { ...p, firewall: createFirewallNode(def.tier) } };
  }
}

/** Restore the firewall to full health. Null if there is nothing to repair. */
export function repairFirewall(state: GameState): GameState | null {
  const fw = state.pipeline.firewall;
  if (!fw) return null;
  const cost = repairCost(fw);
  if (cost <= 0 || state.credits < cost) return null;
  return {
    ...state,
    credits: state.credits - cost,
    pipeline: { ...state.pipeline, firewall: repair(fw) },
  };
}

// ─── Defense stack ─────────────────────────────────────────────────────────

export function unlockDefenseApp(state: GameState, appId: string): GameState | null {
  const def = DEFENSE_APP_MAP[appId];
  if (!def) return null;
  if (!canUnlock(state.defense, appId, maxAvailableTier(state))) return null;
  if (state.credits < def.unlockCost) return null;
  return {
    ...state,
    credits: state.credits - def.unlockCost,
    defense: unlockApp(state.defense, appId),
  };
}

/** Deploy an unlocked tier into its category. Redeploying the current tier is rejected. */
export function deployDefenseApp(state: GameState, category: DefenseCategory, tier: number): GameState | null {
  if (state.defense.apps[category]?.tier === tier) return null;
  if (!DEFENSE_APP_MAP[defenseAppId(category, tier)]) return null;
  const defense = deployApp(state.defense, category, tier);
  return defense ? { ...state, defense } : null;
}

export function upgradeDefenseApp(state: GameState, category: DefenseCategory): GameState | null {
  const app = state.defense.apps[category];
  if (!app) return null;
  const cost = appUpgradeCost(app);
  if (state.credits < cost) return null;
  const defense = upgradeApp(state.defense, category);
  return defense ? { ...state, credits: state.credits - cost, defense } : null;
}

// ─── Intelligence reports ──────────────────────────────────────────────────

/**
 * Spend footprint on a report and bank its credits.
 * Returns null when footprint is short of the report cost.
 */
export function sendIntelReport(state: GameState): { state: GameState; result: ReportResult } | null {
  const sent = sendReport(state.intel, totalIntelMultiplier(state.defense));
  if (!sent) return null;

  const earned = sent.result.creditsEarned;
  return {
    state: {
      ...state,
      credits: state.credits + earned,
      intel: sent.ledger,
      stats: { ...state.stats, totalCreditsEarned: state.stats.totalCreditsEarned + earned },
      campaign: state.campaign ? { ...state.campaign, creditsEarned: state.campaign.creditsEarned + earned } : null,
    },
    result: sent.result,
  };
}

// ─── Campaign ──────────────────────────────────────────────────────────────

/** Leave the current level. Null outside a campaign or after it has ended. */
export function abandonCampaign(
  state: GameState,
  reason: Extract<FailureReason, 'userQuit'> | 'abandoned' = 'abandoned',
): GameState | null {
  if (!state.campaign || state.campaign.state.status !== 'inProgress') return null;
  return { ...state, campaign: abandonLevel(state.campaign, reason) };
}

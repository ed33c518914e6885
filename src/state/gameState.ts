import type {
  CampaignLevelConfig,
  FirewallNode,
  GameState,
  LinkNode,
  PrestigeState,
  SinkNode,
  SourceNode,
  TickStats,
  UnitKind,
} from '../core/types.js';
import { STARTER_UNITS, UNIT_MAP, tierRow, unitId } from '../content/catalog.js';
import { createThreatState } from '../core/threat.js';
import { createIntelLedger } from '../core/intel.js';

// ─── Node factories ─────────────────────────────────────────────────────────

function unitName(kind: UnitKind, tier: number): string {
  return UNIT_MAP[unitId(kind, tier)]?.name ?? `${kind} T${tier}`;
}

export function createSourceNode(tier = 1): SourceNode {
  const row = tierRow(tier);
  return {
    unitId: unitId('source', row.tier),
    name: unitName('source', row.tier),
    baseProduction: row.source.baseProduction,
    level: 1,
    outputType: 'raw',
  };
}

export function createLinkNode(tier = 1): LinkNode {
  const row = tierRow(tier);
  return {
    unitId: unitId('link', row.tier),
    name: unitName('link', row.tier),
    baseBandwidth: row.link.baseBandwidth,
    baseLatency: row.link.baseLatency,
    level: 1,
    lastTickTransferred: 0,
    lastTickDropped: 0,
  };
}

export function createSinkNode(tier = 1): SinkNode {
  const row = tierRow(tier);
  return {
    unitId: unitId('sink', row.tier),
    name: unitName('sink', row.tier),
    baseProcessingRate: row.sink.baseProcessingRate,
    conversionRate: row.sink.conversionRate,
    level: 1,
    inputBuffer: 0,
  };
}

/** New firewalls come online at full health. */
export function createFirewallNode(tier = 1): FirewallNode {
  const row = tierRow(tier);
  const baseHealth = row.firewall.baseHealth;
  return {
    unitId: unitId('firewall', row.tier),
    name: unitName('firewall', row.tier),
    baseHealth,
    baseDamageReduction: row.firewall.baseDamageReduction,
    currentHealth: baseHealth * 1.5,
    level: 1,
  };
}

// ─── Initial state ──────────────────────────────────────────────────────────

export function emptyTickStats(): TickStats {
  return {
    dataGenerated: 0,
    dataTransferred: 0,
    dataDropped: 0,
    creditsEarned: 0,
    creditsDrained: 0,
    damageAbsorbed: 0,
    bufferUtilization: 0,
    dropRate: 0,
    netCredits: 0,
  };
}

export function createInitialState(prestige?: PrestigeState): GameState {
  return {
    version: 1,
    lastTickTime: Date.now(),
    tickCount: 0,
    credits: 0,
    pipeline: {
      source: createSourceNode(1),
      link: createLinkNode(1),
      sink: createSinkNode(1),
      firewall: null,
    },
    debuffs: { bandwidth: 0, processing: 0, disabledNode: null },
    activeEvent: null,
    defense: { apps: {}, unlocked: [] },
    threat: createThreatState(1),
    intel: createIntelLedger(),
    unlockedUnits: [...STARTER_UNITS],
    prestige: prestige ? { ...prestige } : { level: 0, totalCores: 0, availableCores: 0 },
    campaign: null,
    lastTickStats: emptyTickStats(),
    stats: {
      totalCreditsEarned: 0,
      totalDataGenerated: 0,
      totalDataTransferred: 0,
      totalDataDropped: 0,
      playtimeSec: 0,
    },
  };
}

/** Fresh state for a campaign level, already in progress from tick 0. */
export function createCampaignState(level: CampaignLevelConfig, insane = false): GameState {
  const base = createInitialState();
  return {
    ...base,
    credits: level.startingCredits,
    threat: createThreatState(level.startingThreatLevel),
    campaign: {
      level,
      insane,
      state: { status: 'inProgress', startTick: 0 },
      creditsEarned: 0,
      attacksSurvived: 0,
      damageBlocked: 0,
    },
  };
}

/** Highest tier among owned pipeline and firewall units. */
export function highestOwnedTier(state: GameState): number {
  return state.unlockedUnits.reduce((max, id) => Math.max(max, UNIT_MAP[id]?.tier ?? 0), 1);
}

// ─── JSON serialization ─────────────────────────────────────────────────────

export function serializeState(state: GameState): GameState {
  return structuredClone(state);
}

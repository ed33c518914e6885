export type * from './core/types.js';
export { createRng, SeededRng, type Rng } from './core/rng.js';

export * from './core/nodes.js';
export * from './core/firewall.js';
export * from './core/defenseStack.js';
export * from './core/threat.js';
export * from './core/attacks.js';
export * from './core/mitigation.js';
export * from './core/intel.js';
export * from './core/campaign.js';
export * from './core/prestige.js';
export * from './core/events.js';
export { processTick, processOfflineProgress, type TickResult, type OfflineSummary } from './core/tick.js';

export { TIERS, MAX_TIER, UNIT_CATALOG, DEFENSE_APP_CATALOG, unitId, defenseAppId } from './content/catalog.js';
export { THREAT_LEVELS } from './content/threatLevels.js';
export { ATTACK_TYPES } from './content/attackTypes.js';
export { INTEL_MILESTONES } from './content/milestones.js';
export { RANDOM_EVENTS } from './content/events.js';

export * from './config/simulationConfig.js';
export {
  createInitialState,
  createCampaignState,
  createSourceNode,
  createLinkNode,
  createSinkNode,
  createFirewallNode,
} from './state/gameState.js';
export {
  maxAvailableTier,
  equippedNode,
  upgradeCostFor,
  upgradeNode,
  unlockUnit,
  equipUnit,
  repairFirewall,
  unlockDefenseApp,
  deployDefenseApp,
  upgradeDefenseApp,
  sendIntelReport,
  abandonCampaign,
} from './state/actions.js';
export { saveToString, loadFromString, saveToFile, loadFromFile, hasSaveFile, shouldAutosave } from './persistence/saveLoad.js';

export interface ThreatLevelDefinition {
  level: number;
  name: string;
  /** Percent chance (0–100) of an attack roll succeeding each tick */
  attackChance: number;
  /** Base severity multiplier for attacks generated at this level */
  severityMultiplier: number;
  /** Lifetime credits that push the network to this level */
  creditThreshold: number;
  /** Owning a unit or app of at least this tier also reaches the level */
  tierFloor: number | null;
}

export const THREAT_LEVELS: ThreatLevelDefinition[] = [
  { level: 1,  name: 'GHOST',        attackChance: 0.2, severityMultiplier: 0.3, creditThreshold: 0,    tierFloor: null },
  { level: 2,  name: 'BLIP',         attackChance: 0.5, severityMultiplier: 0.5, creditThreshold: 100,  tierFloor: null },
  { level: 3,  name: 'SIGNAL',       attackChance: 1,   severityMultiplier: 1,   creditThreshold: 1e3,  tierFloor: null },
  { level: 4,  name: 'TARGET',       attackChance: 2,   severityMultiplier: 1.5, creditThreshold: 1e4,  tierFloor: 2 },
  { level: 5,  name: 'PRIORITY',     attackChance: 3.5, severityMultiplier: 2,   creditThreshold: 5e4,  tierFloor: null },
  { level: 6,  name: 'HUNTED',       attackChance: 5,   severityMultiplier: 2.5, creditThreshold: 2.5e5, tierFloor: null },
  { level: 7,  name: 'MARKED',       attackChance: 8,   severityMultiplier: 4,   creditThreshold: 1e6,  tierFloor: 3 },
  { level: 8,  name: 'TARGETED',     attackChance: 12,  severityMultiplier: 5.5, creditThreshold: 1e9,  tierFloor: null },
  { level: 9,  name: 'HAMMERED',     attackChance: 18,  severityMultiplier: 7.5, creditThreshold: 1e10, tierFloor: 5 },
  { level: 10, name: 'CRITICAL',     attackChance: 25,  severityMultiplier: 10,  creditThreshold: 5e10, tierFloor: 6 },
  { level: 11, name: 'ASCENDED',     attackChance: 30,  severityMultiplier: 12,  creditThreshold: 1e11, tierFloor: null },
  { level: 12, name: 'SYMBIONT',     attackChance: 35,  severityMultiplier: 15,  creditThreshold: 2e11, tierFloor: null },
  { level: 13, name: 'TRANSCENDENT', attackChance: 40,  severityMultiplier: 18,  creditThreshold: 5e11, tierFloor: null },
  { level: 14, name: 'UNKNOWN',      attackChance: 45,  severityMultiplier: 22,  creditThreshold: 1e12, tierFloor: null },
  { level: 15, name: 'DIMENSIONAL',  attackChance: 50,  severityMultiplier: 27,  creditThreshold: 1e13, tierFloor: null },
  { level: 16, name: 'COSMIC',       attackChance: 55,  severityMultiplier: 33,  creditThreshold: 1e14, tierFloor: null },
  { level: 17, name: 'PARADOX',      attackChance: 60,  severityMultiplier: 40,  creditThreshold: 1e15, tierFloor: null },
  { level: 18, name: 'PRIMORDIAL',   attackChance: 65,  severityMultiplier: 50,  creditThreshold: 1e16, tierFloor: null },
  { level: 19, name: 'INFINITE',     attackChance: 70,  severityMultiplier: 65,  creditThreshold: 1e17, tierFloor: null },
  { level: 20, name: 'OMEGA',        attackChance: 80,  severityMultiplier: 100, creditThreshold: 1e18, tierFloor: null },
];

export const MIN_THREAT_LEVEL = 1;
export const MAX_THREAT_LEVEL = THREAT_LEVELS.length;

/** Campaign levels from here up set a threat floor equal to their id. */
export const CAMPAIGN_THREAT_FLOOR_START = 8;

export const NET_DEFENSE_NAMES: string[] = [
  'EXPOSED',
  'MINIMAL',
  'BASIC',
  'MODERATE',
  'STRONG',
  'FORTIFIED',
  'HARDENED',
  'QUANTUM',
  'NEURAL',
  'HELIX',
];

export function threatLevelDefinition(level: number): ThreatLevelDefinition {
  const idx = Math.min(MAX_THREAT_LEVEL, Math.max(MIN_THREAT_LEVEL, Math.floor(level))) - 1;
  return THREAT_LEVELS[idx];
}

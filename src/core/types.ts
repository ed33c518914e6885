// ─── Shared type definitions ───────────────────────────────────────────────

export type PipelineNodeKind = 'source' | 'link' | 'sink';
export type UnitKind = PipelineNodeKind | 'firewall';

export type DefenseCategory = 'firewall' | 'siem' | 'endpoint' | 'ids' | 'network' | 'encryption';

export type DataType = 'raw' | 'encrypted' | 'telemetry';

export interface DataPacket {
  type: DataType;
  amount: number;
  createdAtTick: number;
}

// ─── Pipeline nodes ────────────────────────────────────────────────────────

export interface SourceNode {
  unitId: string;
  name: string;
  baseProduction: number;
  level: number;
  outputType: DataType;
}

export interface LinkNode {
  unitId: string;
  name: string;
  baseBandwidth: number;
  baseLatency: number;
  level: number;
  lastTickTransferred: number;
  lastTickDropped: number;
}

export interface SinkNode {
  unitId: string;
  name: string;
  baseProcessingRate: number;
  conversionRate: number;
  level: number;
  /** Data waiting to be converted; always within [0, capacity] */
  inputBuffer: number;
}

export interface FirewallNode {
  unitId: string;
  name: string;
  baseHealth: number;
  baseDamageReduction: number;
  currentHealth: number;
  level: number;
}

export interface PipelineState {
  source: SourceNode;
  link: LinkNode;
  sink: SinkNode;
  firewall: FirewallNode | null;
}

/** Effects left behind by the previous tick's combat, consumed by the next pipeline phase. */
export interface PipelineDebuffs {
  /** 0–1 share of link bandwidth lost */
  bandwidth: number;
  /** 0–1 share of sink processing lost */
  processing: number;
  disabledNode: PipelineNodeKind | null;
}

// ─── Defense stack ─────────────────────────────────────────────────────────

export interface DefenseApp {
  category: DefenseCategory;
  tier: number;
  level: number;
}

export interface DefenseStackState {
  /** At most one deployed application per category */
  apps: Partial<Record<DefenseCategory, DefenseApp>>;
  /** App ids (`<category>_t<tier>`) the player has unlocked */
  unlocked: string[];
}

// ─── Threat & attacks ──────────────────────────────────────────────────────

export type AttackType =
  | 'probe'
  | 'ddos'
  | 'intrusion'
  | 'apexStrike'
  | 'coordinatedAssault'
  | 'neuralHijack'
  | 'quantumBreach'
  | 'symbioticInvasion'
  | 'voidRift'
  | 'dimensionalTear'
  | 'causalityLoop'
  | 'timelineCollapse'
  | 'singularityBomb'
  | 'realityUnravel'
  | 'omegaStrike'
  | 'existentialThreat';

export interface Attack {
  id: string;
  type: AttackType;
  severity: number;
  startTick: number;
  duration: number;
  ticksRemaining: number;
  /** Credits actually drained by this attack */
  damageDealt: number;
  /** Credit damage soaked by the mitigation chain */
  blocked: number;
}

/** Per-tick effect of an attack before mitigation. */
export interface DamageEnvelope {
  creditDrain: number;
  bandwidthReduction: number;
  nodeDisableChance: number;
  processingReduction: number;
}

export interface ThreatState {
  /** 1–20, never decreases within a run */
  currentLevel: number;
  /** 0–9, display only */
  netDefenseLevel: number;
  activeAttacks: Attack[];
  attacksSurvived: number;
  attacksPrevented: number;
  totalDamageReceived: number;
  totalDamageBlocked: number;
}

// ─── Intelligence ledger ───────────────────────────────────────────────────

export type MilestoneId =
  | 'firstReport'
  | 'patternAnalyst'
  | 'signatureExpert'
  | 'threatHunter'
  | 'adversaryTracker'
  | 'originDiscovery'
  | 'counterIntel';

export type MilestoneBonusKind =
  | 'intelCollectionRate'
  | 'patternIdSpeed'
  | 'attackWarning'
  | 'damageReduction'
  | 'attackFrequencyReduction';

export interface IntelMilestone {
  id: MilestoneId;
  name: string;
  reportsRequired: number;
  creditReward: number;
  bonus: { kind: MilestoneBonusKind; value: number };
}

export interface IntelLedger {
  footprintData: number;
  /** 0–100 */
  analysisProgress: number;
  patternsIdentified: number;
  knownSignatures: string[];
  reportsSent: number;
  claimedMilestones: MilestoneId[];
  originDiscovered: boolean;
  totalIntelCredits: number;
}

export interface ReportResult {
  creditsEarned: number;
  baseCredits: number;
  milestoneCredits: number;
  milestone: IntelMilestone | null;
  reportNumber: number;
}

// ─── Random events ─────────────────────────────────────────────────────────

export type RandomEventType =
  | 'dataSurge'
  | 'clearChannel'
  | 'marketSpike'
  | 'luckyFind'
  | 'shadowContact'
  | 'networkGlitch'
  | 'congestion'
  | 'marketCrash'
  | 'dataCorruption';

export interface RandomEvent {
  type: RandomEventType;
  startTick: number;
  /** Ticks in force; 0 for one-shot events */
  duration: number;
}

// ─── Campaign ──────────────────────────────────────────────────────────────

export interface VictoryConditions {
  requiredDefenseTier: number;
  requiredDefensePoints: number;
  /** Effective risk must be at or below this threat level */
  requiredRiskLevel: number;
  requiredCredits?: number;
  requiredAttacksSurvived?: number;
  requiredReportsSent?: number;
  timeLimitTicks?: number;
}

export interface InsaneModifiers {
  threatFrequencyMultiplier: number;
  attackDamageMultiplier: number;
  creditIncomeMultiplier: number;
}

export interface CampaignLevelConfig {
  id: number;
  name: string;
  startingCredits: number;
  startingThreatLevel: number;
  /** Highest unit / app tier purchasable in this level */
  availableTiers: number;
  minimumAttackChance: number;
  threatMultiplier: number;
  insaneModifiers: InsaneModifiers;
  victory: VictoryConditions;
}

export type FailureReason = 'timeLimitExceeded' | 'creditsZero' | 'userQuit';
export type LevelGrade = 'S' | 'A' | 'B' | 'C';

export interface LevelCompletionStats {
  levelId: number;
  insane: boolean;
  ticksToComplete: number;
  creditsEarned: number;
  attacksSurvived: number;
  damageBlocked: number;
  finalDefensePoints: number;
  reportsSent: number;
  grade: LevelGrade;
}

export type LevelState =
  | { status: 'notStarted' }
  | { status: 'inProgress'; startTick: number }
  | { status: 'victory'; stats: LevelCompletionStats }
  | { status: 'failed'; reason: FailureReason }
  | { status: 'abandoned' };

export interface CampaignRun {
  level: CampaignLevelConfig;
  insane: boolean;
  state: LevelState;
  creditsEarned: number;
  attacksSurvived: number;
  damageBlocked: number;
}

// ─── Prestige ──────────────────────────────────────────────────────────────

export interface PrestigeState {
  level: number;
  totalCores: number;
  availableCores: number;
}

// ─── Root state ────────────────────────────────────────────────────────────

export interface TickStats {
  dataGenerated: number;
  dataTransferred: number;
  dataDropped: number;
  creditsEarned: number;
  creditsDrained: number;
  damageAbsorbed: number;
  /** Sink load after processing, 0–1 */
  bufferUtilization: number;
  dropRate: number;
  netCredits: number;
}

export interface GameState {
  version: number;
  /** Unix-ms timestamp of when the game was last ticked (for offline calc) */
  lastTickTime: number;
  tickCount: number;
  credits: number;
  pipeline: PipelineState;
  debuffs: PipelineDebuffs;
  /** Timed random event whose multipliers apply to the pipeline */
  activeEvent: RandomEvent | null;
  defense: DefenseStackState;
  threat: ThreatState;
  intel: IntelLedger;
  /** Unit ids (`<kind>_t<tier>`) the player owns */
  unlockedUnits: string[];
  prestige: PrestigeState;
  campaign: CampaignRun | null;
  lastTickStats: TickStats;
  stats: {
    totalCreditsEarned: number;
    totalDataGenerated: number;
    totalDataTransferred: number;
    totalDataDropped: number;
    playtimeSec: number;
  };
}

// ─── Tick events ───────────────────────────────────────────────────────────

export type GameEvent =
  | { kind: 'attackStarted'; attack: Attack }
  | { kind: 'attackEnded'; attack: Attack }
  | { kind: 'attackPrevented'; attackType: AttackType }
  | { kind: 'threatLevelIncreased'; from: number; to: number }
  | { kind: 'nodeDisabled'; node: PipelineNodeKind }
  | { kind: 'firewallDamaged'; absorbed: number; remainingHealth: number }
  | { kind: 'firewallDestroyed' }
  | { kind: 'reportSent'; result: ReportResult }
  | { kind: 'milestoneClaimed'; milestone: IntelMilestone }
  | { kind: 'levelCompleted'; stats: LevelCompletionStats }
  | { kind: 'levelFailed'; reason: FailureReason }
  | { kind: 'eventStarted'; event: RandomEvent }
  | { kind: 'eventEnded'; event: RandomEvent };

import { z } from 'zod';
import { CampaignLevelSchema } from '../config/simulationConfig.js';

// ─── Saved GameState shape ─────────────────────────────────────────────────

const count = z.number().int().nonnegative();
const amount = z.number().nonnegative();
const fraction = z.number().min(0).max(1);

const NodeIdentity = {
  unitId: z.string(),
  name: z.string(),
  level: z.number().int().positive(),
};

const SourceNodeSchema = z.object({
  ...NodeIdentity,
  baseProduction: amount,
  outputType: z.enum(['raw', 'encrypted', 'telemetry']),
});

const LinkNodeSchema = z.object({
  ...NodeIdentity,
  baseBandwidth: amount,
  baseLatency: amount,
  lastTickTransferred: amount,
  lastTickDropped: amount,
});

const SinkNodeSchema = z.object({
  ...NodeIdentity,
  baseProcessingRate: amount,
  conversionRate: amount,
  inputBuffer: amount,
});

const FirewallNodeSchema = z.object({
  ...NodeIdentity,
  baseHealth: amount,
  baseDamageReduction: fraction,
  currentHealth: amount,
});

const PipelineNodeKindSchema = z.enum(['source', 'link', 'sink']);
const DefenseCategorySchema = z.enum(['firewall', 'siem', 'endpoint', 'ids', 'network', 'encryption']);

const DefenseAppSchema = z.object({
  category: DefenseCategorySchema,
  tier: z.number().int().min(1).max(25),
  level: z.number().int().positive(),
});

const AttackTypeSchema = z.enum([
  'probe',
  'ddos',
  'intrusion',
  'apexStrike',
  'coordinatedAssault',
  'neuralHijack',
  'quantumBreach',
  'symbioticInvasion',
  'voidRift',
  'dimensionalTear',
  'causalityLoop',
  'timelineCollapse',
  'singularityBomb',
  'realityUnravel',
  'omegaStrike',
  'existentialThreat',
]);

const AttackSchema = z.object({
  id: z.string(),
  type: AttackTypeSchema,
  severity: amount,
  startTick: count,
  duration: count,
  ticksRemaining: count,
  damageDealt: amount,
  blocked: amount,
});

const MilestoneIdSchema = z.enum([
  'firstReport',
  'patternAnalyst',
  'signatureExpert',
  'threatHunter',
  'adversaryTracker',
  'originDiscovery',
  'counterIntel',
]);

const RandomEventSchema = z.object({
  type: z.enum([
    'dataSurge',
    'clearChannel',
    'marketSpike',
    'luckyFind',
    'shadowContact',
    'networkGlitch',
    'congestion',
    'marketCrash',
    'dataCorruption',
  ]),
  startTick: count,
  duration: count,
});

const FailureReasonSchema = z.enum(['timeLimitExceeded', 'creditsZero', 'userQuit']);

const LevelStateSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('notStarted') }),
  z.object({ status: z.literal('inProgress'), startTick: count }),
  z.object({
    status: z.literal('victory'),
    stats: z.object({
      levelId: z.number().int().positive(),
      insane: z.boolean(),
      ticksToComplete: count,
      creditsEarned: amount,
      attacksSurvived: count,
      damageBlocked: amount,
      finalDefensePoints: amount,
      reportsSent: count,
      grade: z.enum(['S', 'A', 'B', 'C']),
    }),
  }),
  z.object({ status: z.literal('failed'), reason: FailureReasonSchema }),
  z.object({ status: z.literal('abandoned') }),
]);

export const GameStateSchema = z.object({
  version: z.number().int(),
  lastTickTime: z.number(),
  tickCount: count,
  credits: z.number(),
  pipeline: z.object({
    source: SourceNodeSchema,
    link: LinkNodeSchema,
    sink: SinkNodeSchema,
    firewall: FirewallNodeSchema.nullable(),
  }),
  debuffs: z.object({
    bandwidth: fraction,
    processing: fraction,
    disabledNode: PipelineNodeKindSchema.nullable(),
  }),
  activeEvent: RandomEventSchema.nullable(),
  defense: z.object({
    apps: z.object({
      firewall: DefenseAppSchema.optional(),
      siem: DefenseAppSchema.optional(),
      endpoint: DefenseAppSchema.optional(),
      ids: DefenseAppSchema.optional(),
      network: DefenseAppSchema.optional(),
      encryption: DefenseAppSchema.optional(),
    }),
    unlocked: z.array(z.string()),
  }),
  threat: z.object({
    currentLevel: z.number().int().min(1).max(20),
    netDefenseLevel: z.number().int().min(0).max(9),
    activeAttacks: z.array(AttackSchema),
    attacksSurvived: count,
    attacksPrevented: count,
    totalDamageReceived: amount,
    totalDamageBlocked: amount,
  }),
  intel: z.object({
    footprintData: amount,
    analysisProgress: z.number().min(0).max(100),
    patternsIdentified: count,
    knownSignatures: z.array(z.string()),
    reportsSent: count,
    claimedMilestones: z.array(MilestoneIdSchema),
    originDiscovered: z.boolean(),
    totalIntelCredits: amount,
  }),
  unlockedUnits: z.array(z.string()),
  prestige: z.object({ level: count, totalCores: count, availableCores: count }),
  campaign: z
    .object({
      level: CampaignLevelSchema,
      insane: z.boolean(),
      state: LevelStateSchema,
      creditsEarned: amount,
      attacksSurvived: count,
      damageBlocked: amount,
    })
    .nullable(),
  lastTickStats: z.object({
    dataGenerated: amount,
    dataTransferred: amount,
    dataDropped: amount,
    creditsEarned: amount,
    creditsDrained: amount,
    damageAbsorbed: amount,
    bufferUtilization: fraction,
    dropRate: fraction,
    netCredits: z.number(),
  }),
  stats: z.object({
    totalCreditsEarned: amount,
    totalDataGenerated: amount,
    totalDataTransferred: amount,
    totalDataDropped: amount,
    playtimeSec: count,
  }),
});

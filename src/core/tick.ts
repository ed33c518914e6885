import type { Attack, GameEvent, GameState, PipelineNodeKind, TickStats } from './types.js';
import type { Rng } from './rng.js';
import { DEFAULT_CONFIG, NEUTRAL_MODIFIERS, runModifiers, type SimulationConfig } from '../config/simulationConfig.js';
import {
  bufferRemaining,
  linkBandwidth,
  processSink,
  produce,
  receiveData,
  sinkLoad,
  sinkProcessingRate,
  sourceProduction,
  transfer,
} from './nodes.js';
import { firewallTier, healthPercentage, isDestroyed, regenerate, restoreHealth } from './firewall.js';
import {
  deployedCount,
  highestDeployedTier,
  stackReductionCap,
  totalAutomation,
  totalDamageReduction,
  totalDefensePoints,
  totalDetectionBonus,
} from './defenseStack.js';
import {
  amplifyDamage,
  attackPatternSignature,
  damagePerTick,
  isAttackActive,
  tickAttack,
  tryGenerateAttack,
} from './attacks.js';
import { mitigate } from './mitigation.js';
import {
  calculateNetDefense,
  netDefenseDamageReduction,
  riskCalculation,
  threatLevelFor,
  updateThreatLevel,
} from './threat.js';
import {
  addFootprintData,
  attackWarningChance,
  identifyPattern,
  intelDamageReduction,
  patternSpeedBonus,
} from './intel.js';
import {
  applyDataLoss,
  eventModifiers,
  instantEventCredits,
  isEventExpired,
  isTimedEvent,
  tryGenerateEvent,
} from './events.js';
import { applyOutcome, evaluateLevel } from './campaign.js';
import { creditMultiplier, productionMultiplier } from './prestige.js';
import { emptyTickStats, highestOwnedTier } from '../state/gameState.js';
import { sendIntelReport } from '../state/actions.js';

// ─── Fixed-step tick ───────────────────────────────────────────────────────

export interface TickResult {
  state: GameState;
  stats: TickStats;
  events: GameEvent[];
}

const PIPELINE_NODES: readonly PipelineNodeKind[] = ['source', 'link', 'sink'];

/**
 * Advance the session by one tick.
 * Returns a brand-new GameState; never mutates the input. The only side
 * effect is on `rng`, whose draws are consumed in a fixed order.
 *
 * A campaign that has already ended does not advance.
 */
export function processTick(state: GameState, rng: Rng, config: SimulationConfig = DEFAULT_CONFIG): TickResult {
  if (state.campaign && state.campaign.state.status !== 'inProgress') {
    return { state, stats: emptyTickStats(), events: [] };
  }

  const s: GameState = structuredClone(state);
  const events: GameEvent[] = [];
  const tick = s.tickCount + 1;
  s.tickCount = tick;
  s.stats.playtimeSec += 1;

  const mods = s.campaign ? runModifiers(s.campaign.level, s.campaign.insane) : NEUTRAL_MODIFIERS;
  const disabled = s.debuffs.disabledNode;
  // Attack damage scales with what the network earned last tick
  const previousIncome = s.lastTickStats.creditsEarned;

  // ── 0. Random events ──────────────────────────────────────────────────
  if (s.activeEvent && isEventExpired(s.activeEvent, tick)) {
    events.push({ kind: 'eventEnded', event: s.activeEvent });
    s.activeEvent = null;
  }
  if (!s.activeEvent) {
    const rolled = tryGenerateEvent(s.threat.currentLevel, tick, rng);
    if (rolled) {
      events.push({ kind: 'eventStarted', event: rolled });
      if (isTimedEvent(rolled)) s.activeEvent = rolled;
      s.credits += instantEventCredits(rolled, s.stats.totalCreditsEarned);
      s.pipeline.sink = applyDataLoss(s.pipeline.sink, rolled);
    }
  }
  const eventMods = eventModifiers(s.activeEvent);

  // ── 1. Pipeline ───────────────────────────────────────────────────────
  const packet = produce(s.pipeline.source, tick);
  const generated = disabled === 'source' ? 0 : packet.amount * eventMods.source * productionMultiplier(s.prestige);

  const bandwidthCap = linkBandwidth(s.pipeline.link) * (1 - s.debuffs.bandwidth) * eventMods.bandwidth;
  const maxAcceptable = disabled === 'link' ? 0 : Math.min(bufferRemaining(s.pipeline.sink), bandwidthCap);
  const moved = transfer(s.pipeline.link, generated, maxAcceptable);
  s.pipeline.link = moved.link;

  const received = receiveData(s.pipeline.sink, moved.transferred);
  const processed = processSink(received.sink, disabled === 'sink' ? 0 : 1 - s.debuffs.processing);
  s.pipeline.sink = processed.sink;

  const creditsEarned =
    processed.credits * eventMods.credit * creditMultiplier(s.prestige) * mods.creditIncomeMultiplier;
  s.credits += creditsEarned;
  s.stats.totalCreditsEarned += creditsEarned;
  s.stats.totalDataGenerated += generated;
  s.stats.totalDataTransferred += moved.transferred;
  s.stats.totalDataDropped += moved.dropped;
  if (s.campaign) s.campaign.creditsEarned += creditsEarned;

  // ── 2. Combat ─────────────────────────────────────────────────────────
  const automation = totalAutomation(s.defense);
  const ended: Attack[] = [];
  const active: Attack[] = [];

  // 2a. Age running attacks; high automation sometimes shortens them
  for (const attack of s.threat.activeAttacks) {
    const steps = automation >= 0.5 && rng.next() < (automation - 0.5) * 2 ? 2 : 1;
    const aged = tickAttack(attack, steps);
    if (isAttackActive(aged)) {
      active.push(aged);
    } else {
      ended.push(aged);
      s.threat.attacksSurvived += 1;
      if (s.campaign) {
        s.campaign.attacksSurvived += 1;
        s.campaign.damageBlocked += aged.blocked;
      }
      events.push({ kind: 'attackEnded', attack: aged });
    }
  }

  // 2b. Roll for a new attack
  if (active.length < config.maxConcurrentAttacks) {
    // Raw threat level alone sets the frequency; defenses only cut damage
    const attack = tryGenerateAttack(s.threat.currentLevel, tick, rng, {
      frequencyMultiplier: mods.frequencyMultiplier,
      minimumChance: mods.minimumAttackChance,
    });
    if (attack) {
      const warning = attackWarningChance(s.intel);
      if (warning > 0 && rng.next() < warning) {
        s.threat.attacksPrevented += 1;
        events.push({ kind: 'attackPrevented', attackType: attack.type });
      } else {
        active.push(attack);
        events.push({ kind: 'attackStarted', attack });
      }
    }
  }

  // 2c. Resolve damage
  const stackReduction = Math.min(
    stackReductionCap(highestDeployedTier(s.defense)),
    totalDamageReduction(s.defense) + intelDamageReduction(s.intel),
  );
  const netDefenseReduction = netDefenseDamageReduction(s.threat.netDefenseLevel);

  let bandwidthDebuff = 0;
  let processingDebuff = 0;
  let disabledNode: PipelineNodeKind | null = null;
  let creditsDrained = 0;
  let damageAbsorbed = 0;

  s.threat.activeAttacks = active.map((attack) => {
    const raw = amplifyDamage(damagePerTick(attack, previousIncome), mods.damageMultiplier);
    const before = s.pipeline.firewall;
    const result = mitigate(raw, { firewall: before, stackReduction, netDefenseReduction });
    s.pipeline.firewall = result.firewall;

    if (result.firewall && result.absorbedByFirewall > 0) {
      events.push({
        kind: 'firewallDamaged',
        absorbed: result.absorbedByFirewall,
        remainingHealth: result.firewall.currentHealth,
      });
      if (before && !isDestroyed(before) && isDestroyed(result.firewall)) {
        events.push({ kind: 'firewallDestroyed' });
      }
    }

    const drained = Math.min(Math.max(0, s.credits), result.damage.creditDrain);
    const blocked = result.firewallMitigated + result.percentMitigated;
    s.credits -= drained;
    creditsDrained += drained;
    damageAbsorbed += result.absorbedByFirewall;
    s.threat.totalDamageReceived += drained;
    s.threat.totalDamageBlocked += blocked;

    bandwidthDebuff = Math.max(bandwidthDebuff, result.damage.bandwidthReduction);
    processingDebuff = Math.max(processingDebuff, result.damage.processingReduction);

    if (result.damage.nodeDisableChance > 0 && rng.next() < result.damage.nodeDisableChance) {
      disabledNode = PIPELINE_NODES[rng.nextInt(PIPELINE_NODES.length)];
      events.push({ kind: 'nodeDisabled', node: disabledNode });
    }

    return { ...attack, damageDealt: attack.damageDealt + drained, blocked: attack.blocked + blocked };
  });

  s.debuffs = { bandwidth: bandwidthDebuff, processing: processingDebuff, disabledNode };

  // ── 3. Firewall upkeep ────────────────────────────────────────────────
  if (s.pipeline.firewall) {
    let fw = regenerate(s.pipeline.firewall);
    if (automation >= 0.25) fw = restoreHealth(fw, 0.01 + (automation - 0.25) * 0.027);
    s.pipeline.firewall = fw;
  }

  // ── 4. Threat & net defense ───────────────────────────────────────────
  const previousLevel = s.threat.currentLevel;
  const candidate = threatLevelFor(s.stats.totalCreditsEarned, highestOwnedTier(s), s.campaign?.level.id ?? 0);
  s.threat = updateThreatLevel(s.threat, candidate);
  if (s.threat.currentLevel > previousLevel) {
    events.push({ kind: 'threatLevelIncreased', from: previousLevel, to: s.threat.currentLevel });
  }

  const fw = s.pipeline.firewall;
  s.threat.netDefenseLevel = fw ? calculateNetDefense(firewallTier(fw), fw.level, healthPercentage(fw)) : 0;

  // ── 5. Intelligence ───────────────────────────────────────────────────
  if (deployedCount(s.defense) > 0) {
    const detection = totalDetectionBonus(s.defense);
    if (automation >= 0.75) s.intel = addFootprintData(s.intel, automation, detection);

    for (const attack of ended) {
      const evidence = attack.blocked * 0.5 + attack.duration * 15 + attack.severity * 25;
      s.intel = addFootprintData(s.intel, evidence, detection);
      s.intel = identifyPattern(s.intel, attackPatternSignature(attack), patternSpeedBonus(s.intel), rng);
      if (attack.type === 'apexStrike') {
        s.intel = identifyPattern(s.intel, `apex_signature_${tick % 100}`, patternSpeedBonus(s.intel), rng);
      }
    }
  }

  let next = s;
  if (config.autoSubmitReports) {
    const sent = sendIntelReport(next);
    if (sent) {
      next = sent.state;
      events.push({ kind: 'reportSent', result: sent.result });
      if (sent.result.milestone) events.push({ kind: 'milestoneClaimed', milestone: sent.result.milestone });
    }
  }

  // ── 6. Campaign level ─────────────────────────────────────────────────
  if (next.campaign) {
    const outcome = evaluateLevel(next.campaign, tick, next.credits, {
      highestDefenseTier: highestDeployedTier(next.defense),
      defensePoints: totalDefensePoints(next.defense),
      riskLevel: riskCalculation(next.threat).effectiveRisk,
      creditsEarned: next.campaign.creditsEarned,
      attacksSurvived: next.campaign.attacksSurvived,
      reportsSent: next.intel.reportsSent,
    });
    next = { ...next, campaign: applyOutcome(next.campaign, outcome) };
    if (outcome.kind === 'victory') events.push({ kind: 'levelCompleted', stats: outcome.stats });
    if (outcome.kind === 'failed') events.push({ kind: 'levelFailed', reason: outcome.reason });
  }

  const stats: TickStats = {
    dataGenerated: generated,
    dataTransferred: moved.transferred,
    dataDropped: moved.dropped,
    creditsEarned,
    creditsDrained,
    damageAbsorbed,
    bufferUtilization: sinkLoad(next.pipeline.sink),
    dropRate: generated > 0 ? moved.dropped / generated : 0,
    netCredits: creditsEarned - creditsDrained,
  };

  return { state: { ...next, lastTickStats: stats }, stats, events };
}

// ─── Offline progression ───────────────────────────────────────────────────

export interface OfflineSummary {
  elapsedSeconds: number;
  ticksSimulated: number;
  creditsEarned: number;
}

/**
 * Credit the time since `lastTickTime` at a reduced, combat-free rate.
 * Capped at 8 hours (4 during a campaign) by default.
 */
export function processOfflineProgress(
  state: GameState,
  nowMs: number,
  config: SimulationConfig = DEFAULT_CONFIG,
): { newState: GameState; summary: OfflineSummary } {
  const offline = config.offline;
  const inCampaign = state.campaign !== null;
  const rawElapsed = Math.max(0, (nowMs - state.lastTickTime) / 1000);
  const campaignEnded = state.campaign !== null && state.campaign.state.status !== 'inProgress';

  if (rawElapsed < offline.minSeconds || campaignEnded) {
    return {
      newState: { ...state, lastTickTime: nowMs },
      summary: { elapsedSeconds: rawElapsed, ticksSimulated: 0, creditsEarned: 0 },
    };
  }

  const elapsed = Math.min(rawElapsed, inCampaign ? offline.campaignCapSeconds : offline.capSeconds);
  const efficiency = inCampaign ? offline.campaignEfficiency : offline.efficiency;
  const ticks = Math.floor(elapsed);

  const { source, link, sink } = state.pipeline;
  const throughput = Math.min(
    sourceProduction(source) * productionMultiplier(state.prestige),
    linkBandwidth(link),
    sinkProcessingRate(sink),
  );
  const perTick = throughput * sink.conversionRate * efficiency * creditMultiplier(state.prestige);
  const creditsEarned = perTick * ticks;

  return {
    newState: {
      ...state,
      lastTickTime: nowMs,
      credits: state.credits + creditsEarned,
      stats: { ...state.stats, totalCreditsEarned: state.stats.totalCreditsEarned + creditsEarned },
      campaign: state.campaign
        ? { ...state.campaign, creditsEarned: state.campaign.creditsEarned + creditsEarned }
        : null,
    },
    summary: { elapsedSeconds: elapsed, ticksSimulated: ticks, creditsEarned },
  };
}

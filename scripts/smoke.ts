#!/usr/bin/env tsx
/**
 * Grid Defense: smoke run
 *
 * Plays a seeded headless session: grows the pipeline, buys a firewall and
 * defense apps, files intel reports, then plays one campaign level.
 * Checks the per-tick invariants along the way and exits 1 on a breach.
 *
 * Run with: npm run smoke
 */
import type { DefenseCategory, GameEvent, GameState, UnitKind } from '../src/core/types.js';
import { createRng } from '../src/core/rng.js';
import { createCampaignState, createInitialState } from '../src/state/gameState.js';
import { processTick } from '../src/core/tick.js';
import {
  deployDefenseApp,
  equipUnit,
  repairFirewall,
  sendIntelReport,
  unlockDefenseApp,
  unlockUnit,
  upgradeCostFor,
  upgradeDefenseApp,
  upgradeNode,
} from '../src/state/actions.js';
import { sinkCapacity } from '../src/core/nodes.js';
import { firewallMaxHealth, healthPercentage } from '../src/core/firewall.js';
import { totalDamageReduction, totalDefensePoints } from '../src/core/defenseStack.js';
import { threatLevelName } from '../src/core/threat.js';
import { defenseAppId, unitId } from '../src/content/catalog.js';
import { RANDOM_EVENT_MAP } from '../src/content/events.js';
import { parseCampaignLevel, parseSimulationConfig } from '../src/config/simulationConfig.js';
import { loadFromString, saveToString } from '../src/persistence/saveLoad.js';

// ─── Helpers ───────────────────────────────────────────────────────────────

function fmt(n: number, dec = 0): string {
  if (n >= 1_000_000) return `${(n / 1_000_000).toFixed(1)}M`;
  if (n >= 1_000) return `${(n / 1_000).toFixed(1)}k`;
  return n.toFixed(dec);
}

function info(tick: number, msg: string): void {
  console.log(`[Smoke] [Tick ${String(tick).padStart(4)}] ${msg}`);
}

function fail(msg: string): never {
  console.error(`[Smoke] ✗ ${msg}`);
  process.exit(1);
}

function checkInvariants(state: GameState): void {
  const { sink, firewall } = state.pipeline;
  if (sink.inputBuffer < 0 || sink.inputBuffer > sinkCapacity(sink) + 1e-9) {
    fail(`tick ${state.tickCount}: sink buffer ${sink.inputBuffer} outside [0, ${sinkCapacity(sink)}]`);
  }
  if (firewall && (firewall.currentHealth < 0 || firewall.currentHealth > firewallMaxHealth(firewall) + 1e-9)) {
    fail(`tick ${state.tickCount}: firewall health ${firewall.currentHealth} out of range`);
  }
  if (state.credits < 0) fail(`tick ${state.tickCount}: negative credits`);
}

function describeEvent(event: GameEvent): string | null {
  switch (event.kind) {
    case 'attackStarted':
      return `⚠ ${event.attack.type} started (severity ${event.attack.severity.toFixed(2)})`;
    case 'attackEnded':
      return `✓ ${event.attack.type} survived (drained ${fmt(event.attack.damageDealt)}, blocked ${fmt(event.attack.blocked)})`;
    case 'attackPrevented':
      return `✓ ${event.attackType} stopped by early warning`;
    case 'threatLevelIncreased':
      return `Threat ${event.from} → ${event.to} (${threatLevelName(event.to)})`;
    case 'firewallDestroyed':
      return 'Firewall destroyed';
    case 'milestoneClaimed':
      return `★ Milestone: ${event.milestone.name}`;
    case 'levelCompleted':
      return `★ Level ${event.stats.levelId} complete, grade ${event.stats.grade}`;
    case 'levelFailed':
      return `Level failed: ${event.reason}`;
    case 'eventStarted':
      return `Event: ${RANDOM_EVENT_MAP[event.event.type].name}`;
    case 'eventEnded':
      return `Event over: ${RANDOM_EVENT_MAP[event.event.type].name}`;
    default:
      return null;
  }
}

// ─── Auto-play ─────────────────────────────────────────────────────────────

const NODE_KINDS: readonly UnitKind[] = ['source', 'link', 'sink', 'firewall'];
const APP_CATEGORIES: readonly DefenseCategory[] = ['firewall', 'siem', 'endpoint'];

/** One purchase per tick: repairs, then firewall, then the cheapest node, then apps. */
function autoPlay(state: GameState): { state: GameState; bought: string | null } {
  const fw = state.pipeline.firewall;
  if (fw && healthPercentage(fw) < 0.3) {
    const next = repairFirewall(state);
    if (next) return { state: next, bought: 'Repaired firewall' };
  }

  if (!fw) {
    const unlocked = unlockUnit(state, unitId('firewall', 1));
    const next = unlocked ? equipUnit(unlocked, unitId('firewall', 1)) : null;
    if (next) return { state: next, bought: 'Firewall online' };
  }

  let cheapest: { kind: UnitKind; cost: number } | null = null;
  for (const kind of NODE_KINDS) {
    const cost = upgradeCostFor(state, kind);
    if (cost !== null && (!cheapest || cost < cheapest.cost)) cheapest = { kind, cost };
  }
  if (cheapest && state.credits >= cheapest.cost) {
    const next = upgradeNode(state, cheapest.kind);
    if (next) return { state: next, bought: `Upgraded ${cheapest.kind} (${fmt(cheapest.cost)}C)` };
  }

  for (const kind of NODE_KINDS) {
    const id = unitId(kind, 2);
    const unlocked = unlockUnit(state, id);
    const next = unlocked ? equipUnit(unlocked, id) : null;
    if (next) return { state: next, bought: `Equipped ${id}` };
  }

  for (const category of APP_CATEGORIES) {
    const app = state.defense.apps[category];
    if (!app) {
      const unlocked = unlockDefenseApp(state, defenseAppId(category, 1));
      const next = unlocked ? deployDefenseApp(unlocked, category, 1) : null;
      if (next) return { state: next, bought: `Deployed ${defenseAppId(category, 1)}` };
      continue;
    }
    const next = upgradeDefenseApp(state, category);
    if (next) return { state: next, bought: `Upgraded ${category} app to L${app.level + 1}` };
  }

  const report = sendIntelReport(state);
  if (report) return { state: report.state, bought: `Report #${report.result.reportNumber} (+${fmt(report.result.creditsEarned)}C)` };

  return { state, bought: null };
}

function play(start: GameState, ticks: number, seed: number, label: string): GameState {
  const rng = createRng(seed);
  const config = parseSimulationConfig({ maxConcurrentAttacks: 2 });
  let state = start;

  for (let i = 0; i < ticks; i++) {
    const result = processTick(state, rng, config);
    state = result.state;
    checkInvariants(state);

    for (const event of result.events) {
      const line = describeEvent(event);
      if (line) info(state.tickCount, line);
    }

    const { state: afterBuy, bought } = autoPlay(state);
    if (bought) {
      state = afterBuy;
      if (state.tickCount % 50 === 0) info(state.tickCount, bought);
    }

    if (state.campaign && state.campaign.state.status !== 'inProgress') break;
  }

  console.log(`[Smoke] ${label}: ${state.tickCount} ticks, ${fmt(state.stats.totalCreditsEarned)} credits earned`);
  return state;
}

// ─── Main smoke run ────────────────────────────────────────────────────────

function runSmoke(): void {
  console.log('[Smoke] Grid defense simulation smoke run\n');

  const sandbox = play(createInitialState(), 1500, 2024, 'Sandbox');

  const restored = loadFromString(saveToString(sandbox, 42));
  if (restored.state.tickCount !== sandbox.tickCount || restored.rngState !== 42) {
    fail('save round trip changed the state');
  }

  const level = parseCampaignLevel({
    id: 1,
    name: 'First Contact',
    startingCredits: 500,
    availableTiers: 2,
    minimumAttackChance: 2,
    victory: { requiredDefenseTier: 1, requiredDefensePoints: 30, requiredRiskLevel: 20, timeLimitTicks: 1800 },
  });
  const campaign = play(createCampaignState(level), 1800, 7, `Campaign level ${level.id}`);
  const outcome = campaign.campaign?.state.status ?? 'none';

  console.log('\n' + '═'.repeat(56));
  console.log('  SMOKE RUN COMPLETE');
  console.log('═'.repeat(56));
  console.log(`  Threat level      : ${sandbox.threat.currentLevel} (${threatLevelName(sandbox.threat.currentLevel)})`);
  console.log(`  Attacks survived  : ${sandbox.threat.attacksSurvived}`);
  console.log(`  Damage blocked    : ${fmt(sandbox.threat.totalDamageBlocked)}`);
  console.log(`  Defense points    : ${fmt(totalDefensePoints(sandbox.defense))}`);
  console.log(`  Stack reduction   : ${(totalDamageReduction(sandbox.defense) * 100).toFixed(1)}%`);
  console.log(`  Reports sent      : ${sandbox.intel.reportsSent}`);
  console.log(`  Campaign outcome  : ${outcome}`);

  if (sandbox.stats.totalCreditsEarned <= 0) fail('the sandbox run earned nothing');
  console.log('\n[Smoke] ✓ Invariants held on every tick.');
}

runSmoke();

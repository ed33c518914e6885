import type { GameState, PrestigeState } from './types.js';
import { createInitialState } from '../state/gameState.js';

// ─── Prestige calculations ──────────────────────────────────────────────────

const PRESTIGE_BASE_CREDITS = 150_000;
const PRESTIGE_GROWTH = 5;

export function productionMultiplier(p: PrestigeState): number {
  return 1 + p.level * 0.1 + p.totalCores * 0.05;
}

export function creditMultiplier(p: PrestigeState): number {
  return 1 + p.level * 0.15;
}

/** Lifetime run credits needed for the next prestige: 150k, 750k, 3.75M, ... */
export function creditsRequiredForPrestige(level: number): number {
  return PRESTIGE_BASE_CREDITS * Math.pow(PRESTIGE_GROWTH, level);
}

/** One core, plus one for every 2× the requirement. */
export function coresEarned(totalCredits: number, level: number): number {
  const ratio = totalCredits / creditsRequiredForPrestige(level);
  return Math.max(1, Math.floor(ratio / 2) + 1);
}

export function canPrestige(state: GameState): boolean {
  return state.campaign === null
    && state.stats.totalCreditsEarned >= creditsRequiredForPrestige(state.prestige.level);
}

/**
 * Wipe the network and start over with permanent multipliers.
 * Returns null when the requirement is not met.
 */
export function applyPrestige(state: GameState): GameState | null {
  if (!canPrestige(state)) return null;
  const cores = coresEarned(state.stats.totalCreditsEarned, state.prestige.level);
  return createInitialState({
    level: state.prestige.level + 1,
    totalCores: state.prestige.totalCores + cores,
    availableCores: state.prestige.availableCores + cores,
  });
}

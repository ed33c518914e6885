import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import type { GameState } from '../core/types.js';
import { serializeState } from '../state/gameState.js';
import { DEFAULT_CONFIG, formatZodError, type SimulationConfig } from '../config/simulationConfig.js';
import { GameStateSchema } from './stateSchema.js';

const SAVE_VERSION = 1;
const DEFAULT_SAVE_PATH = './grid-defense-save.json';

const SaveHeaderSchema = z.object({ v: z.number() }).passthrough();

const SaveFileSchema = z.object({
  v: z.literal(SAVE_VERSION),
  rngState: z.number().int().nonnegative().nullable().default(null),
  data: GameStateSchema,
});

export interface LoadedSave {
  state: GameState;
  /** Generator state to resume with `createRng`; null if none was saved */
  rngState: number | null;
}

// ─── Serialization ─────────────────────────────────────────────────────────

export function saveToString(state: GameState, rngState: number | null = null): string {
  return JSON.stringify({ v: SAVE_VERSION, rngState, data: serializeState(state) }, null, 2);
}

export function loadFromString(json: string): LoadedSave {
  const raw: unknown = JSON.parse(json);

  const header = SaveHeaderSchema.safeParse(raw);
  if (!header.success) {
    throw new Error(`Invalid save file: ${formatZodError(header.error)}`);
  }
  if (header.data.v !== SAVE_VERSION) {
    throw new Error(`Save file version mismatch: expected ${SAVE_VERSION}, got ${header.data.v}`);
  }

  const parsed = SaveFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid save file: ${formatZodError(parsed.error)}`);
  }
  return { state: parsed.data.data, rngState: parsed.data.rngState };
}

// ─── File I/O ──────────────────────────────────────────────────────────────

export function saveToFile(state: GameState, rngState: number | null = null, path = DEFAULT_SAVE_PATH): void {
  writeFileSync(path, saveToString(state, rngState), 'utf8');
}

export function loadFromFile(path = DEFAULT_SAVE_PATH): LoadedSave | null {
  if (!existsSync(path)) return null;
  try {
    return loadFromString(readFileSync(path, 'utf8'));
  } catch (err) {
    console.error('[SaveLoad] Failed to load save:', err);
    return null;
  }
}

export function hasSaveFile(path = DEFAULT_SAVE_PATH): boolean {
  return existsSync(path);
}

// ─── Autosave helper ──────────────────────────────────────────────────────

export function shouldAutosave(state: GameState, config: SimulationConfig = DEFAULT_CONFIG): boolean {
  return state.tickCount % config.autosaveIntervalTicks === 0;
}

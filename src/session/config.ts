/**
 * Engine configuration.
 *
 * Every numeric budget can be overridden at session start; the CLI also
 * reads them from the environment.
 */

import type { Side } from '../rules/types';

export interface EngineConfig {
  /** Hard limit for one agent invocation in ms */
  agentTimeoutMs: number;
  /** Attempts per agent per turn; also the cooperative penalty weight */
  maxRetries: number;
  /** Combined cooperative failure weight that ends an episode */
  maxTotalFail: number;
  /** Delay between failed attempts, and after each failed cooperative resolution */
  pacingDelayMs: number;
  /** Added on top of the worst-case worker duration for the outer deadline */
  deadlineGraceMs: number;
  /** Pause after each applied move so a watcher can follow the game */
  moveDelayMs: number;
  /** Side the human plays in cooperative mode */
  humanSide: Side;
}

type NumericKey = Exclude<keyof EngineConfig, 'humanSide'>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  agentTimeoutMs: 30_000,
  maxRetries: 5,
  maxTotalFail: 10,
  pacingDelayMs: 1000,
  deadlineGraceMs: 10_000,
  moveDelayMs: 1000,
  humanSide: 'white',
};

/**
 * Throws if a budget makes the engine unable to run.
 */
export function validateConfig(config: EngineConfig): EngineConfig {
  const nonNegative: NumericKey[] = ['agentTimeoutMs', 'pacingDelayMs', 'moveDelayMs'];
  for (const key of nonNegative) {
    const value = config[key];
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`Invalid ${key}: ${value} (expected a non-negative number)`);
    }
  }
  if (!Number.isFinite(config.deadlineGraceMs) || config.deadlineGraceMs <= 0) {
    throw new Error(`Invalid deadlineGraceMs: ${config.deadlineGraceMs} (expected a positive number)`);
  }
  if (!Number.isInteger(config.maxRetries) || config.maxRetries < 1) {
    throw new Error(`Invalid maxRetries: ${config.maxRetries} (expected an integer >= 1)`);
  }
  if (!Number.isInteger(config.maxTotalFail) || config.maxTotalFail < 1) {
    throw new Error(`Invalid maxTotalFail: ${config.maxTotalFail} (expected an integer >= 1)`);
  }
  if (config.humanSide !== 'white' && config.humanSide !== 'black') {
    throw new Error(`Invalid humanSide: ${String(config.humanSide)}`);
  }
  return config;
}

export function resolveConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return validateConfig({ ...DEFAULT_ENGINE_CONFIG, ...overrides });
}

const ENV_KEYS: Record<string, NumericKey> = {
  AGENT_TIMEOUT_MS: 'agentTimeoutMs',
  MAX_RETRIES: 'maxRetries',
  MAX_TOTAL_FAIL: 'maxTotalFail',
  PACING_DELAY_MS: 'pacingDelayMs',
  DEADLINE_GRACE_MS: 'deadlineGraceMs',
  MOVE_DELAY_MS: 'moveDelayMs',
};

function parseNumber(name: string, raw: string): number {
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0 || String(value) !== raw.trim()) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

/**
 * Reads numeric overrides from environment variables. Unset variables are
 * left out so defaults apply.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<EngineConfig> {
  const overrides: Partial<EngineConfig> = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const raw = env[name];
    if (raw === undefined || raw === '') continue;
    overrides[key] = parseNumber(name, raw);
  }
  const side = env.HUMAN_SIDE;
  if (side === 'white' || side === 'black') {
    overrides.humanSide = side;
  } else if (side !== undefined && side !== '') {
    throw new Error(`HUMAN_SIDE must be "white" or "black", got "${side}"`);
  }
  return overrides;
}

/**
 * Outer bound for one agent resolution: every attempt timing out, plus the
 * pacing between attempts, plus a grace period. Strictly larger than the
 * longest a resolution can take on its own.
 */
export function computeTurnDeadlineMs(config: EngineConfig): number {
  return (
    config.maxRetries * config.agentTimeoutMs +
    (config.maxRetries - 1) * config.pacingDelayMs +
    config.deadlineGraceMs
  );
}

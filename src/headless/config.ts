// Headless runner configuration
// Values come from the environment (a .env file is loaded by index.ts)
// Example: TICK_RATE=240 MATCH_DURATION=30 npm start

import { DEFAULT_ARENA_HEIGHT, DEFAULT_ARENA_WIDTH } from '../shared/constants';
import { createInvalidArgumentError } from '../shared/errors';

export interface RunnerConfig {
  arenaWidth: number;
  arenaHeight: number;
  /** Ticks per simulated second */
  tickRate: number;
  /** Simulated seconds */
  matchDuration: number;
  seed: number;
  fightersPerSide: number;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw createInvalidArgumentError(name, raw, 'a number');
  }
  return value;
}

function readPositive(env: Env, name: string, fallback: number): number {
  const value = readNumber(env, name, fallback);
  if (value <= 0) {
    throw createInvalidArgumentError(name, value, '> 0');
  }
  return value;
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const value = readPositive(env, name, fallback);
  if (!Number.isInteger(value)) {
    throw createInvalidArgumentError(name, value, 'an integer');
  }
  return value;
}

/**
 * Build the runner configuration from environment variables.
 *
 * @throws SimulationError (INVALID_ARGUMENT) for malformed or out-of-range values
 */
export function loadConfig(env: Env = process.env): RunnerConfig {
  return {
    arenaWidth: readPositive(env, 'ARENA_WIDTH', DEFAULT_ARENA_WIDTH),
    arenaHeight: readPositive(env, 'ARENA_HEIGHT', DEFAULT_ARENA_HEIGHT),
    tickRate: readPositiveInt(env, 'TICK_RATE', 120),
    matchDuration: readPositive(env, 'MATCH_DURATION', 20),
    seed: Math.trunc(readNumber(env, 'SEED', 7)),
    fightersPerSide: readPositiveInt(env, 'FIGHTERS_PER_SIDE', 1),
  };
}

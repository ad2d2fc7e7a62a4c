/**
 * Shared Simulation Core Module
 *
 * Platform-independent combat physics that can be driven by the headless
 * runner, a test, or any front-end that reads snapshots.
 */

// Types
export * from './types';

// Entities and helpers
export { Body, normalizeRole, normalizeTeam } from './Body';
export { InvincibleTeams } from './InvincibleTeams';
export { createTuning, validateTuning } from './tuning';
export { createRng, nextFloat, nextRange, nextInt, type RngState } from './rng';

// Systems
export { IntegrationSystem } from './IntegrationSystem';
export { CollisionSystem, pairKey, effectiveInverseMass, type CollisionResult } from './CollisionSystem';
export { ImpactSystem, type ImpactOutcome } from './ImpactSystem';
export { AbilitySystem } from './AbilitySystem';
export { inflictDamage, type CombatContext } from './combat';

// Main Engine
export { World } from './World';
export { runMatch, decideWinner, type MatchOptions, type MatchResult } from './match';
export { createDuelWorld, createClashWorld, type DuelOptions, type ClashOptions } from './scenarios';

// Defaults and errors
export { DEFAULT_TUNING } from '../constants';
export { SimulationError, SimulationErrorCode } from '../errors';

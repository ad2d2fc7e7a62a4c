/**
 * Shared constants for the brawl simulation
 * Used by the core engine, scenario presets and the headless runner
 */

import type { Role, Tuning } from './core/types';

// Arena
export const DEFAULT_ARENA_WIDTH = 1400;
export const DEFAULT_ARENA_HEIGHT = 520;

// Numeric guards
export const EPSILON = 1e-6;
export const DEGENERATE_DISTANCE_SQ = 1e-12;
export const TANGENT_EPSILON = 1e-9;

// Body defaults
export const DEFAULT_POWER = 1.0;
export const DEFAULT_MAX_HP = 100;
export const DEFAULT_ROLE: Role = 'dealer';
export const BASELINE_STAT = 10;
export const MIN_STAT_FACTOR = 0.5;
export const MAX_STAT_FACTOR = 2.0;

export const ROLES: readonly Role[] = [
  'tank',
  'dealer',
  'healer',
  'ranged_dealer',
  'ranged_healer',
];

// Ability shaping
export const HEALER_RANGE_FACTOR = 0.7;
export const HEALER_AMOUNT_FACTOR = 0.8;
export const RANGED_HEALER_AMOUNT_FACTOR = 1.1;
export const RANGED_HEALER_POKE_RANGE_FACTOR = 0.9;
export const RANGED_HEALER_POKE_FORCE_FACTOR = 0.58;
export const RANGED_DAMAGE_MIN_POWER = 0.6;
export const KNOCKBACK_NORMAL_LIFT = 0.12;
export const KNOCKBACK_LIFT_BIAS = 0.18;
export const KNOCKBACK_STAGGER_BONUS = 0.12;

// Diagnostic impulse
export const DEFAULT_RANDOM_IMPULSE = 420;

// Match runner
export const HP_TIE_TOLERANCE = 1e-6;
export const DRAW = 'draw';

export const DEFAULT_TUNING: Readonly<Tuning> = Object.freeze({
  gravity: 900.0,
  approachForce: 1150.0,
  restitution: 0.68,
  wallRestitution: 0.55,
  linearDamping: 0.16,
  friction: 0.2,
  wallFriction: 0.08,
  groundFriction: 0.3,
  groundSnapSpeed: 42.0,
  collisionBoost: 1.0,
  solverPasses: 3,
  positionCorrection: 0.8,
  massPowerImpactScale: 120.0,
  powerRatioExponent: 0.5,
  impactSpeedCap: 1400.0,
  minRecoilSpeed: 45.0,
  recoilScale: 0.62,
  minLaunchSpeed: 90.0,
  launchScale: 0.45,
  launchHeightScale: 1.0,
  maxLaunchSpeed: 820.0,
  damageBase: 1.5,
  damageScale: 0.028,
  staggerBase: 0.06,
  staggerScale: 0.0012,
  maxStagger: 1.2,
  staggerDriveMultiplier: 0.0,
  rangedAttackCooldown: 1.0,
  rangedAttackRange: 520.0,
  rangedKnockbackForce: 240.0,
  rangedDamage: 5.5,
  healerCooldown: 1.2,
  healerRange: 360.0,
  healerAmount: 10.0,
});

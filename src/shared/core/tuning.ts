import { Tuning, TuningKey } from './types';
import { DEFAULT_TUNING } from '../constants';
import { createInvalidTuningError } from '../errors';

type Rule = 'finite' | '>= 0' | '> 0' | 'in [0, 1]' | 'integer >= 1';

const TUNING_RULES: Record<TuningKey, Rule> = {
  gravity: 'finite',
  approachForce: 'finite',
  restitution: '>= 0',
  wallRestitution: '>= 0',
  linearDamping: '>= 0',
  friction: '>= 0',
  wallFriction: '>= 0',
  groundFriction: '>= 0',
  groundSnapSpeed: '>= 0',
  collisionBoost: '> 0',
  solverPasses: 'integer >= 1',
  positionCorrection: 'in [0, 1]',
  massPowerImpactScale: '> 0',
  powerRatioExponent: '>= 0',
  impactSpeedCap: '> 0',
  minRecoilSpeed: '>= 0',
  recoilScale: '>= 0',
  minLaunchSpeed: '>= 0',
  launchScale: '>= 0',
  launchHeightScale: '> 0',
  maxLaunchSpeed: '> 0',
  damageBase: '>= 0',
  damageScale: '>= 0',
  staggerBase: '>= 0',
  staggerScale: '>= 0',
  maxStagger: '>= 0',
  staggerDriveMultiplier: '>= 0',
  rangedAttackCooldown: '> 0',
  rangedAttackRange: '> 0',
  rangedKnockbackForce: '>= 0',
  rangedDamage: '>= 0',
  healerCooldown: '> 0',
  healerRange: '> 0',
  healerAmount: '>= 0',
};

function isTuningKey(key: string): key is TuningKey {
  return key in TUNING_RULES;
}

const TUNING_KEYS: readonly TuningKey[] = Object.keys(TUNING_RULES).filter(isTuningKey);

function meetsRule(value: number, rule: Rule): boolean {
  if (typeof value !== 'number' || !Number.isFinite(value)) return false;
  switch (rule) {
    case 'finite':
      return true;
    case '>= 0':
      return value >= 0;
    case '> 0':
      return value > 0;
    case 'in [0, 1]':
      return value >= 0 && value <= 1;
    case 'integer >= 1':
      return Number.isInteger(value) && value >= 1;
  }
}

/**
 * Check every coefficient against its bound.
 *
 * @throws SimulationError (INVALID_TUNING) naming the first offending field
 */
export function validateTuning(tuning: Tuning): void {
  for (const key of TUNING_KEYS) {
    const rule = TUNING_RULES[key];
    if (!meetsRule(tuning[key], rule)) {
      throw createInvalidTuningError(key, tuning[key], rule);
    }
  }
}

/**
 * Build a validated, frozen tuning bundle from the defaults plus overrides.
 */
export function createTuning(overrides: Partial<Tuning> = {}): Readonly<Tuning> {
  const tuning: Tuning = { ...DEFAULT_TUNING };
  for (const key of TUNING_KEYS) {
    const value = overrides[key];
    if (value !== undefined) {
      tuning[key] = value;
    }
  }
  validateTuning(tuning);
  return Object.freeze(tuning);
}

import { BodyInit, BodySnapshot, Role } from './types';
import {
  BASELINE_STAT,
  DEFAULT_MAX_HP,
  DEFAULT_POWER,
  DEFAULT_ROLE,
  MAX_STAT_FACTOR,
  MIN_STAT_FACTOR,
  ROLES,
} from '../constants';
import { createInvalidBodyError } from '../errors';

/**
 * Map a raw role name onto a known role.
 *
 * Matching ignores case and surrounding whitespace; anything unknown is a dealer.
 */
export function normalizeRole(raw: string | undefined): Role {
  const role = (raw ?? '').trim().toLowerCase();
  return ROLES.find((known) => known === role) ?? DEFAULT_ROLE;
}

/**
 * Team names compare trimmed and lowercased everywhere.
 */
export function normalizeTeam(raw: string): string {
  return raw.trim().toLowerCase();
}

function statFactor(stat: number): number {
  return Math.min(MAX_STAT_FACTOR, Math.max(MIN_STAT_FACTOR, stat / BASELINE_STAT));
}

function requireFinite(field: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw createInvalidBodyError(field, value, 'a finite number');
  }
  return value;
}

function requirePositive(field: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw createInvalidBodyError(field, value, '> 0');
  }
  return value;
}

function requireNonNegative(field: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw createInvalidBodyError(field, value, '>= 0');
  }
  return value;
}

/**
 * A single fighter: physical state plus combat state.
 *
 * Kinematic fields are public because the integrator and solver write them
 * every pass. Hit points only change through takeDamage() and heal(),
 * which keep hp inside [0, maxHp].
 */
export class Body {
  readonly id: number;
  readonly team: string;
  readonly role: Role;
  readonly radius: number;
  readonly mass: number;
  readonly power: number;
  readonly maxHp: number;
  readonly forwardDir: number;
  readonly intStat: number;
  readonly wisStat: number;

  x: number;
  y: number;
  vx: number;
  vy: number;
  staggerTimer: number;
  abilityCooldown: number;
  lastDamage = 0;

  private hitPoints: number;

  /**
   * @throws SimulationError (INVALID_BODY) when any field is out of range
   */
  constructor(init: BodyInit) {
    if (!Number.isInteger(init.id)) {
      throw createInvalidBodyError('id', init.id, 'an integer');
    }
    const team = normalizeTeam(init.team);
    if (team === '') {
      throw createInvalidBodyError('team', init.team, 'a non-empty name');
    }

    this.id = init.id;
    this.team = team;
    this.role = normalizeRole(init.role);
    this.x = requireFinite('x', init.x);
    this.y = requireFinite('y', init.y);
    this.vx = requireFinite('vx', init.vx ?? 0);
    this.vy = requireFinite('vy', init.vy ?? 0);
    this.radius = requirePositive('radius', init.radius);
    this.mass = requirePositive('mass', init.mass);
    this.power = requirePositive('power', init.power ?? DEFAULT_POWER);
    this.forwardDir = requireFinite('forwardDir', init.forwardDir ?? 0);
    this.maxHp = requirePositive('maxHp', init.maxHp ?? DEFAULT_MAX_HP);
    this.intStat = requirePositive('intStat', init.intStat ?? BASELINE_STAT);
    this.wisStat = requirePositive('wisStat', init.wisStat ?? BASELINE_STAT);
    this.staggerTimer = requireNonNegative('staggerTimer', init.staggerTimer ?? 0);
    this.abilityCooldown = requireNonNegative('abilityCooldown', init.abilityCooldown ?? 0);

    const hp = requireNonNegative('hp', init.hp ?? this.maxHp);
    if (hp > this.maxHp) {
      throw createInvalidBodyError('hp', hp, `<= maxHp (${this.maxHp})`);
    }
    this.hitPoints = hp;
  }

  get hp(): number {
    return this.hitPoints;
  }

  get alive(): boolean {
    return this.hitPoints > 0;
  }

  get hpRatio(): number {
    return this.hitPoints / this.maxHp;
  }

  /** Multiplier on ranged ability reach, from intStat */
  get rangeFactor(): number {
    return statFactor(this.intStat);
  }

  /** Multiplier on healing reach, from wisStat */
  get healRangeFactor(): number {
    return statFactor(this.wisStat);
  }

  /** Multiplier on healing cooldown, shrinking as wisStat grows */
  get healCooldownFactor(): number {
    return 1 / statFactor(this.wisStat);
  }

  /**
   * Remove hit points, stopping at zero.
   *
   * @returns true if this hit killed the body
   */
  takeDamage(amount: number): boolean {
    if (!this.alive || amount <= 0) return false;
    this.hitPoints = Math.max(0, this.hitPoints - amount);
    return !this.alive;
  }

  /**
   * Restore hit points, stopping at maxHp. Dead bodies cannot be healed.
   *
   * @returns hit points actually restored
   */
  heal(amount: number): number {
    if (!this.alive || amount <= 0) return 0;
    const before = this.hitPoints;
    this.hitPoints = Math.min(this.maxHp, this.hitPoints + amount);
    return this.hitPoints - before;
  }

  snapshot(): BodySnapshot {
    return {
      id: this.id,
      team: this.team,
      role: this.role,
      x: this.x,
      y: this.y,
      vx: this.vx,
      vy: this.vy,
      radius: this.radius,
      mass: this.mass,
      power: this.power,
      hp: this.hitPoints,
      maxHp: this.maxHp,
      alive: this.alive,
      staggerTimer: this.staggerTimer,
      abilityCooldown: this.abilityCooldown,
      lastDamage: this.lastDamage,
    };
  }
}

/**
 * Platform-independent simulation types
 *
 * Shared by the core engine, scenario presets and any consumer that drives a
 * World (headless runner, front-ends). No rendering or transport concerns.
 */

// =============================================================================
// Role Types
// =============================================================================

/**
 * Combat role of a fighter
 *
 * - tank / dealer: melee only, no ability
 * - healer: heals the most injured nearby ally
 * - ranged_dealer: knocks back and damages the nearest enemy
 * - ranged_healer: heals and pokes on the same cooldown
 */
export type Role = 'tank' | 'dealer' | 'healer' | 'ranged_dealer' | 'ranged_healer';

// =============================================================================
// Body Types
// =============================================================================

/**
 * Everything needed to spawn a body.
 *
 * Optional fields take the defaults from constants.ts.
 */
export interface BodyInit {
  id: number;
  team: string;
  x: number;
  y: number;
  vx?: number;
  vy?: number;
  radius: number;
  mass: number;
  power?: number;
  /** Unrecognized names become 'dealer' */
  role?: string;
  /** Sign gives the drive direction, 0 means no drive */
  forwardDir?: number;
  maxHp?: number;
  /** Defaults to maxHp */
  hp?: number;
  staggerTimer?: number;
  abilityCooldown?: number;
  /** Scales ranged ability reach (baseline 10) */
  intStat?: number;
  /** Scales healing reach and cooldown (baseline 10) */
  wisStat?: number;
}

/**
 * Read-only copy of a body at the end of a tick
 */
export interface BodySnapshot {
  id: number;
  team: string;
  role: Role;
  x: number;
  y: number;
  vx: number;
  vy: number;
  radius: number;
  mass: number;
  power: number;
  hp: number;
  maxHp: number;
  alive: boolean;
  staggerTimer: number;
  abilityCooldown: number;
  lastDamage: number;
}

// =============================================================================
// Tuning Types
// =============================================================================

/**
 * Physics and combat coefficients.
 *
 * Validated as a whole by createTuning(); a World never holds an invalid one.
 */
export interface Tuning {
  gravity: number;
  approachForce: number;
  restitution: number;
  wallRestitution: number;
  linearDamping: number;
  friction: number;
  wallFriction: number;
  groundFriction: number;
  groundSnapSpeed: number;
  collisionBoost: number;
  /** Iterations of the pairwise solver per tick */
  solverPasses: number;
  /** Fraction of penetration removed per pass, in [0, 1] */
  positionCorrection: number;
  massPowerImpactScale: number;
  powerRatioExponent: number;
  impactSpeedCap: number;
  minRecoilSpeed: number;
  recoilScale: number;
  minLaunchSpeed: number;
  launchScale: number;
  launchHeightScale: number;
  maxLaunchSpeed: number;
  damageBase: number;
  damageScale: number;
  staggerBase: number;
  staggerScale: number;
  maxStagger: number;
  /** Drive multiplier while staggered (0 freezes the fighter) */
  staggerDriveMultiplier: number;
  rangedAttackCooldown: number;
  rangedAttackRange: number;
  rangedKnockbackForce: number;
  rangedDamage: number;
  healerCooldown: number;
  healerRange: number;
  healerAmount: number;
}

export type TuningKey = keyof Tuning;

// =============================================================================
// Event Types
// =============================================================================

export type DamageCause = 'impact' | 'ranged';

export interface ImpactEvent {
  type: 'impact';
  aId: number;
  bId: number;
  damageA: number;
  damageB: number;
}

export interface DamageEvent {
  type: 'damage';
  targetId: number;
  sourceId: number;
  amount: number;
  cause: DamageCause;
}

export interface HealEvent {
  type: 'heal';
  targetId: number;
  sourceId: number;
  /** Hit points actually restored after clamping */
  amount: number;
}

export interface KnockbackEvent {
  type: 'knockback';
  targetId: number;
  sourceId: number;
}

export interface DeathEvent {
  type: 'death';
  bodyId: number;
  team: string;
}

export type SimulationEvent = ImpactEvent | DamageEvent | HealEvent | KnockbackEvent | DeathEvent;

/**
 * Receives events as systems produce them
 */
export type EventSink = (event: SimulationEvent) => void;

// =============================================================================
// World Types
// =============================================================================

/**
 * Callbacks for world events
 *
 * Invoked synchronously at the end of step(), once the tick is committed;
 * a consumer must not call step() from a callback.
 */
export interface WorldCallbacks {
  /** Called for every event of the step, in the order it happened */
  onEvent?: (event: SimulationEvent) => void;

  /** Called once a step has fully completed */
  onStep?: (snapshot: WorldSnapshot) => void;
}

/** Team names given as a list or a set; a bare string is not a list of teams */
export type TeamNames = readonly string[] | ReadonlySet<string>;

export interface WorldOptions {
  width: number;
  height: number;
  bodies: BodyInit[];
  tuning?: Partial<Tuning>;
  invincibleTeams?: TeamNames;
  callbacks?: WorldCallbacks;
}

export interface WorldSnapshot {
  width: number;
  height: number;
  timeElapsed: number;
  totalCollisions: number;
  lastStepCollisions: number;
  bodies: BodySnapshot[];
  events: SimulationEvent[];
}

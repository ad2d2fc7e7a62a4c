/**
 * World - Simulation integration point
 *
 * The World owns every body and the tuning of one match and advances them
 * with a fixed-timestep pipeline:
 *
 *   integrate (each body) -> collide (N solver passes, first contacts feed the
 *   impact model) -> abilities -> telemetry
 *
 * Key responsibilities:
 * - Validate bodies, arena and tuning at the boundary
 * - Run step(dt) deterministically (id order, fixed pass count, no clock)
 * - Track which pairs are touching so impacts only fire on new contacts
 * - Collect per-step events and expose telemetry and snapshots
 *
 * A World is driven by exactly one owner. Run independent matches on
 * independent World instances.
 */

import { Body, normalizeTeam } from './Body';
import { CollisionSystem } from './CollisionSystem';
import { ImpactSystem } from './ImpactSystem';
import { AbilitySystem } from './AbilitySystem';
import { IntegrationSystem } from './IntegrationSystem';
import { InvincibleTeams } from './InvincibleTeams';
import { CombatContext } from './combat';
import { RngState, nextRange } from './rng';
import { createTuning } from './tuning';
import { SimulationEvent, TeamNames, Tuning, WorldCallbacks, WorldOptions, WorldSnapshot } from './types';
import { DEFAULT_RANDOM_IMPULSE } from '../constants';
import {
  createDuplicateBodyIdError,
  createEmptyBodyListError,
  createInvalidArgumentError,
  createInvalidTimestepError,
  createInvalidWorldError,
} from '../errors';
import { createLogger } from '../logger';

const logger = createLogger('World');

export class World {
  readonly width: number;
  readonly height: number;

  private readonly bodies: Body[];
  private readonly bodiesById: Map<number, Body> = new Map();
  private readonly invincible: InvincibleTeams;
  private readonly callbacks: WorldCallbacks;
  private readonly integration: IntegrationSystem;
  private readonly collision = new CollisionSystem();
  private readonly impact = new ImpactSystem();
  private readonly abilities = new AbilitySystem();
  private readonly combat: CombatContext;

  private tuning: Readonly<Tuning>;
  private activeContacts: Set<string> = new Set();
  private events: SimulationEvent[] = [];
  private elapsed = 0;
  private collisionsTotal = 0;
  private collisionsLastStep = 0;

  /**
   * Create a new World
   *
   * @throws SimulationError when the arena, any body or the tuning is invalid
   */
  constructor(options: WorldOptions) {
    if (!Number.isFinite(options.width) || options.width <= 0) {
      throw createInvalidWorldError('width', options.width);
    }
    if (!Number.isFinite(options.height) || options.height <= 0) {
      throw createInvalidWorldError('height', options.height);
    }
    if (options.bodies.length === 0) {
      throw createEmptyBodyListError();
    }

    this.width = options.width;
    this.height = options.height;
    this.tuning = createTuning(options.tuning);

    const bodies = options.bodies.map((init) => new Body(init));
    for (const body of bodies) {
      if (this.bodiesById.has(body.id)) {
        throw createDuplicateBodyIdError(body.id);
      }
      this.bodiesById.set(body.id, body);
    }
    this.bodies = bodies.sort((a, b) => a.id - b.id);

    this.invincible = new InvincibleTeams(options.invincibleTeams ?? []);
    this.callbacks = options.callbacks ?? {};
    this.integration = new IntegrationSystem(this.width, this.height);
    this.combat = {
      invincible: this.invincible,
      emit: (event) => this.record(event),
    };

    logger.debug('World created', {
      width: this.width,
      height: this.height,
      bodies: this.bodies.length,
      teams: this.getTeams(),
    });
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  getBodies(): readonly Body[] {
    return this.bodies;
  }

  getBody(id: number): Body | undefined {
    return this.bodiesById.get(id);
  }

  getTuning(): Readonly<Tuning> {
    return this.tuning;
  }

  get timeElapsed(): number {
    return this.elapsed;
  }

  get totalCollisions(): number {
    return this.collisionsTotal;
  }

  get lastStepCollisions(): number {
    return this.collisionsLastStep;
  }

  /** Pair keys ("lo:hi") touching at the end of the last step */
  getActiveContacts(): ReadonlySet<string> {
    return this.activeContacts;
  }

  /** Events produced by the last step, in order */
  getLastStepEvents(): readonly SimulationEvent[] {
    return this.events;
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  /**
   * Replace the tuning. The new bundle is built on the defaults, so a partial
   * object only overrides the fields it names.
   *
   * @throws SimulationError (INVALID_TUNING); the previous tuning stays active
   */
  setTuning(tuning: Partial<Tuning>): void {
    try {
      this.tuning = createTuning(tuning);
    } catch (error) {
      logger.warn('Rejected tuning update', error instanceof Error ? error.message : String(error));
      throw error;
    }
    logger.info('Tuning updated', { solverPasses: this.tuning.solverPasses });
  }

  /**
   * Replace the set of invincible teams. Names are trimmed and lowercased.
   */
  setInvincibleTeams(teams: TeamNames): void {
    this.invincible.set(teams);
  }

  isTeamInvincible(team: string): boolean {
    return this.invincible.has(team);
  }

  getInvincibleTeams(): string[] {
    return this.invincible.list();
  }

  /**
   * Kick every living body in a random direction.
   *
   * Each velocity component gains uniform(-magnitude, magnitude) / mass,
   * drawn from the caller's generator.
   *
   * @throws SimulationError (INVALID_ARGUMENT) when magnitude is not > 0
   */
  addRandomImpulse(rng: RngState, magnitude: number = DEFAULT_RANDOM_IMPULSE): void {
    if (!Number.isFinite(magnitude) || magnitude <= 0) {
      throw createInvalidArgumentError('magnitude', magnitude, '> 0');
    }

    for (const body of this.bodies) {
      if (!body.alive) continue;
      body.vx += nextRange(rng, -magnitude, magnitude) / body.mass;
      body.vy += nextRange(rng, -magnitude, magnitude) / body.mass;
    }
  }

  // ===========================================================================
  // Simulation
  // ===========================================================================

  /**
   * Advance the simulation by dt seconds.
   *
   * @throws SimulationError (INVALID_TIMESTEP) when dt is not > 0
   */
  step(dt: number): void {
    if (!Number.isFinite(dt) || dt <= 0) {
      throw createInvalidTimestepError(dt);
    }

    this.events = [];
    const tuning = this.tuning;

    for (const body of this.bodies) {
      this.integration.integrate(body, tuning, dt);
    }

    const { collisions, contacts } = this.collision.resolve(
      this.bodies,
      tuning,
      this.activeContacts,
      (a, b, nx) => this.impact.apply(a, b, nx, tuning, this.combat)
    );

    this.abilities.update(this.bodies, tuning, this.combat);

    this.activeContacts = contacts;
    this.collisionsLastStep = collisions;
    this.collisionsTotal += collisions;
    this.elapsed += dt;

    // Listeners only ever see a fully committed tick
    const { onEvent, onStep } = this.callbacks;
    if (onEvent) {
      for (const event of this.events) {
        onEvent(event);
      }
    }
    onStep?.(this.snapshot());
  }

  // ===========================================================================
  // Telemetry
  // ===========================================================================

  /**
   * Fastest speed among living bodies, 0 when none is alive.
   */
  maxSpeed(): number {
    let max = 0;
    for (const body of this.bodies) {
      if (!body.alive) continue;
      max = Math.max(max, Math.hypot(body.vx, body.vy));
    }
    return max;
  }

  /** Sorted unique team names */
  getTeams(): string[] {
    return Array.from(new Set(this.bodies.map((body) => body.team))).sort();
  }

  /** Sum of hit points of a team's bodies */
  teamHp(team: string): number {
    const name = normalizeTeam(team);
    return this.bodies.filter((body) => body.team === name).reduce((sum, body) => sum + body.hp, 0);
  }

  /** Sorted names of teams with at least one living body */
  aliveTeams(): string[] {
    return Array.from(new Set(this.bodies.filter((body) => body.alive).map((body) => body.team))).sort();
  }

  snapshot(): WorldSnapshot {
    return {
      width: this.width,
      height: this.height,
      timeElapsed: this.elapsed,
      totalCollisions: this.collisionsTotal,
      lastStepCollisions: this.collisionsLastStep,
      bodies: this.bodies.map((body) => body.snapshot()),
      events: [...this.events],
    };
  }

  private record(event: SimulationEvent): void {
    this.events.push(event);
    if (event.type === 'death') {
      logger.debug('Body died', { bodyId: event.bodyId, team: event.team, time: this.elapsed });
    }
  }
}

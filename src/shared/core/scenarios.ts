/**
 * Ready-made worlds for quick matches and tests.
 *
 * - Duel: two lines of fighters on the floor charging each other
 * - Clash: "player" and "monster" formations dropped from the upper arena
 */

import { World } from './World';
import { createRng, nextRange, RngState } from './rng';
import { BodyInit, Tuning } from './types';
import { DEFAULT_ARENA_HEIGHT, DEFAULT_ARENA_WIDTH } from '../constants';
import { createInvalidArgumentError } from '../errors';

export interface DuelOptions {
  width?: number;
  height?: number;
  leftRadius?: number;
  rightRadius?: number;
  leftMass?: number;
  rightMass?: number;
  leftPower?: number;
  rightPower?: number;
  leftHp?: number;
  rightHp?: number;
  leftInitialSpeed?: number;
  rightInitialSpeed?: number;
  fightersPerSide?: number;
  sideMargin?: number;
  leftInvincible?: boolean;
  rightInvincible?: boolean;
  tuning?: Partial<Tuning>;
}

export interface ClashOptions {
  width?: number;
  height?: number;
  playerCount?: number;
  monsterCount?: number;
  radius?: number;
  playerMass?: number;
  monsterMass?: number;
  spawnJitter?: number;
  seed?: number;
  tuning?: Partial<Tuning>;
}

const DUEL_SPACING = 2.3;
const CLASH_SPACING = 2.4;
const CLASH_MAX_ROWS = 6;
const CLASH_BASE_SPEED = 95;

function requirePositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw createInvalidArgumentError(name, value, '> 0');
  }
}

function requireNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw createInvalidArgumentError(name, value, '>= 0');
  }
}

function requirePositiveInt(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw createInvalidArgumentError(name, value, 'an integer > 0');
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Two teams, "left" and "right", lined up on the floor and running at each other.
 *
 * Bodies alternate left/right so ids 0, 2, 4... are on the left.
 */
export function createDuelWorld(options: DuelOptions = {}): World {
  const width = options.width ?? DEFAULT_ARENA_WIDTH;
  const height = options.height ?? DEFAULT_ARENA_HEIGHT;
  const leftRadius = options.leftRadius ?? 32;
  const rightRadius = options.rightRadius ?? 32;
  const leftHp = options.leftHp ?? 100;
  const rightHp = options.rightHp ?? 100;
  const fightersPerSide = options.fightersPerSide ?? 1;
  const sideMargin = options.sideMargin ?? 120;

  requirePositive('width', width);
  requirePositive('height', height);
  requirePositive('leftHp', leftHp);
  requirePositive('rightHp', rightHp);
  requirePositiveInt('fightersPerSide', fightersPerSide);
  requireNonNegative('sideMargin', sideMargin);

  const leftStartX = sideMargin + leftRadius;
  const rightStartX = width - sideMargin - rightRadius;
  const bodies: BodyInit[] = [];

  for (let slot = 0; slot < fightersPerSide; slot++) {
    bodies.push({
      id: bodies.length,
      team: 'left',
      x: clamp(leftStartX + slot * leftRadius * DUEL_SPACING, leftRadius, width - leftRadius),
      y: height - leftRadius,
      vx: Math.abs(options.leftInitialSpeed ?? 260),
      vy: 0,
      radius: leftRadius,
      mass: options.leftMass ?? 1.0,
      power: options.leftPower ?? 1.0,
      forwardDir: 1,
      maxHp: leftHp,
      hp: leftHp,
    });
    bodies.push({
      id: bodies.length,
      team: 'right',
      x: clamp(rightStartX - slot * rightRadius * DUEL_SPACING, rightRadius, width - rightRadius),
      y: height - rightRadius,
      vx: -Math.abs(options.rightInitialSpeed ?? 210),
      vy: 0,
      radius: rightRadius,
      mass: options.rightMass ?? 1.2,
      power: options.rightPower ?? 1.6,
      forwardDir: -1,
      maxHp: rightHp,
      hp: rightHp,
    });
  }

  const invincibleTeams: string[] = [];
  if (options.leftInvincible) invincibleTeams.push('left');
  if (options.rightInvincible) invincibleTeams.push('right');

  return new World({ width, height, bodies, tuning: options.tuning, invincibleTeams });
}

interface FormationOptions {
  team: string;
  count: number;
  anchorX: number;
  anchorY: number;
  towardCenter: number;
  radius: number;
  mass: number;
  spawnJitter: number;
  firstId: number;
  width: number;
  height: number;
}

function spawnFormation(options: FormationOptions, rng: RngState): BodyInit[] {
  const { radius, spawnJitter, towardCenter } = options;
  const rows = clamp(Math.ceil(Math.sqrt(options.count)), 1, CLASH_MAX_ROWS);
  const spacing = radius * CLASH_SPACING;
  const wobble = radius * 0.15;
  const spawned: BodyInit[] = [];

  for (let idx = 0; idx < options.count; idx++) {
    const row = idx % rows;
    const col = Math.floor(idx / rows);

    let x = options.anchorX - col * spacing * towardCenter;
    let y = options.anchorY + (row - (rows - 1) * 0.5) * spacing;
    x += nextRange(rng, -wobble, wobble);
    y += nextRange(rng, -wobble, wobble);

    spawned.push({
      id: options.firstId + idx,
      team: options.team,
      x: clamp(x, radius, options.width - radius),
      y: clamp(y, radius, options.height - radius),
      vx: towardCenter * (CLASH_BASE_SPEED + nextRange(rng, -spawnJitter, spawnJitter) * 0.35),
      vy: nextRange(rng, -spawnJitter, spawnJitter) * 0.22,
      radius,
      mass: options.mass,
      power: 1.0,
      forwardDir: towardCenter,
      maxHp: 100,
      hp: 100,
    });
  }

  return spawned;
}

/**
 * A "player" formation on the left against a "monster" formation on the
 * right, with seeded position and velocity jitter.
 */
export function createClashWorld(options: ClashOptions = {}): World {
  const width = options.width ?? 960;
  const height = options.height ?? 620;
  const playerCount = options.playerCount ?? 8;
  const monsterCount = options.monsterCount ?? 8;
  const radius = options.radius ?? 16;
  const playerMass = options.playerMass ?? 1.0;
  const monsterMass = options.monsterMass ?? 1.2;
  const spawnJitter = options.spawnJitter ?? 120;

  requirePositive('width', width);
  requirePositive('height', height);
  requirePositiveInt('playerCount', playerCount);
  requirePositiveInt('monsterCount', monsterCount);
  requirePositive('radius', radius);
  requirePositive('playerMass', playerMass);
  requirePositive('monsterMass', monsterMass);
  requireNonNegative('spawnJitter', spawnJitter);

  const rng = createRng(options.seed ?? 7);
  const shared = { radius, spawnJitter, width, height };

  const players = spawnFormation(
    {
      ...shared,
      team: 'player',
      count: playerCount,
      anchorX: width * 0.22,
      anchorY: height * 0.22,
      towardCenter: 1,
      mass: playerMass,
      firstId: 0,
    },
    rng
  );
  const monsters = spawnFormation(
    {
      ...shared,
      team: 'monster',
      count: monsterCount,
      anchorX: width * 0.78,
      anchorY: height * 0.22,
      towardCenter: -1,
      mass: monsterMass,
      firstId: players.length,
    },
    rng
  );

  return new World({ width, height, bodies: [...players, ...monsters], tuning: options.tuning });
}

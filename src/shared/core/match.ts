import { World } from './World';
import { DRAW, HP_TIE_TOLERANCE } from '../constants';
import { createInvalidArgumentError } from '../errors';

export interface MatchOptions {
  /** Simulated seconds before the match is called */
  duration: number;
  /** Fixed timestep in seconds */
  dt: number;
  /** Called after every tick with the 1-based tick number */
  onTick?: (world: World, tick: number) => void;
}

export interface MatchResult {
  /** Winning team name, or 'draw' */
  winner: string;
  ticks: number;
  elapsed: number;
  totalCollisions: number;
  /** Simulated time of the first tick with a collision, null if none */
  firstCollisionTime: number | null;
  peakSpeed: number;
  /** Remaining hit points per team */
  teamHp: Record<string, number>;
}

/**
 * Decide the winner of a world as it stands.
 *
 * The only team with survivors wins. With no survivors it is a draw.
 * Otherwise the team with the most remaining hit points wins, and a tie at
 * the top is a draw.
 */
export function decideWinner(world: World): string {
  const alive = world.aliveTeams();
  if (alive.length === 1) return alive[0];
  if (alive.length === 0) return DRAW;

  const ranked = alive
    .map((team) => ({ team, hp: world.teamHp(team) }))
    .sort((a, b) => b.hp - a.hp);
  if (ranked[0].hp - ranked[1].hp < HP_TIE_TOLERANCE) return DRAW;
  return ranked[0].team;
}

/**
 * Step a world until at most one team has survivors or the duration runs out.
 *
 * @throws SimulationError (INVALID_ARGUMENT) when duration or dt is not > 0
 */
export function runMatch(world: World, options: MatchOptions): MatchResult {
  const { duration, dt } = options;
  if (!Number.isFinite(duration) || duration <= 0) {
    throw createInvalidArgumentError('duration', duration, '> 0');
  }
  if (!Number.isFinite(dt) || dt <= 0) {
    throw createInvalidArgumentError('dt', dt, '> 0');
  }

  const maxTicks = Math.max(1, Math.floor(duration / dt));
  let ticks = 0;
  let firstCollisionTime: number | null = null;
  let peakSpeed = world.maxSpeed();

  while (ticks < maxTicks) {
    world.step(dt);
    ticks++;

    if (firstCollisionTime === null && world.lastStepCollisions > 0) {
      firstCollisionTime = ticks * dt;
    }
    peakSpeed = Math.max(peakSpeed, world.maxSpeed());
    options.onTick?.(world, ticks);

    if (world.aliveTeams().length <= 1) break;
  }

  const teamHp: Record<string, number> = {};
  for (const team of world.getTeams()) {
    teamHp[team] = world.teamHp(team);
  }

  return {
    winner: decideWinner(world),
    ticks,
    elapsed: world.timeElapsed,
    totalCollisions: world.totalCollisions,
    firstCollisionTime,
    peakSpeed,
    teamHp,
  };
}

import 'dotenv/config';
import { createDuelWorld, createRng, runMatch, MatchResult } from '../shared/core';
import { createLogger, LogLevel } from '../shared/logger';
import { loadConfig, RunnerConfig } from './config';

const logger = createLogger('Headless');

/**
 * Run one seeded duel with the given configuration.
 */
export function runDuel(config: RunnerConfig): MatchResult {
  const world = createDuelWorld({
    width: config.arenaWidth,
    height: config.arenaHeight,
    fightersPerSide: config.fightersPerSide,
  });
  world.addRandomImpulse(createRng(config.seed));

  return runMatch(world, {
    duration: config.matchDuration,
    dt: 1 / config.tickRate,
  });
}

export function main(): void {
  try {
    const config = loadConfig();
    logger.info('Starting duel', { ...config, logLevel: LogLevel[logger.getLevel()] });

    const result = runDuel(config);
    logger.info(`Winner: ${result.winner}`, {
      ticks: result.ticks,
      elapsed: Number(result.elapsed.toFixed(3)),
      totalCollisions: result.totalCollisions,
      firstCollisionTime: result.firstCollisionTime,
      peakSpeed: Number(result.peakSpeed.toFixed(1)),
      teamHp: result.teamHp,
    });
  } catch (error) {
    logger.error('Duel failed', error);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main();
}

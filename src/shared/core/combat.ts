import { Body } from './Body';
import { InvincibleTeams } from './InvincibleTeams';
import { DamageCause, EventSink } from './types';

/**
 * What the impact and ability systems need besides the bodies themselves
 */
export interface CombatContext {
  invincible: InvincibleTeams;
  emit: EventSink;
}

/**
 * Apply damage to a body unless its team is invincible.
 *
 * Emits a damage event, plus a death event when the hit is lethal.
 *
 * @returns amount applied (0 for an invincible target)
 */
export function inflictDamage(
  target: Body,
  amount: number,
  sourceId: number,
  cause: DamageCause,
  ctx: CombatContext
): number {
  if (amount <= 0 || !target.alive || ctx.invincible.has(target.team)) {
    return 0;
  }

  const killed = target.takeDamage(amount);
  ctx.emit({ type: 'damage', targetId: target.id, sourceId, amount, cause });
  if (killed) {
    ctx.emit({ type: 'death', bodyId: target.id, team: target.team });
  }
  return amount;
}

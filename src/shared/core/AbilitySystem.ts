import { Body } from './Body';
import { CombatContext, inflictDamage } from './combat';
import { Tuning } from './types';
import {
  EPSILON,
  HEALER_AMOUNT_FACTOR,
  HEALER_RANGE_FACTOR,
  KNOCKBACK_LIFT_BIAS,
  KNOCKBACK_NORMAL_LIFT,
  KNOCKBACK_STAGGER_BONUS,
  RANGED_DAMAGE_MIN_POWER,
  RANGED_HEALER_AMOUNT_FACTOR,
  RANGED_HEALER_POKE_FORCE_FACTOR,
  RANGED_HEALER_POKE_RANGE_FACTOR,
  TANGENT_EPSILON,
} from '../constants';

/**
 * AbilitySystem runs role abilities that act at a distance.
 *
 * Once per tick, every living body whose cooldown has run out acts according
 * to its role:
 * - ranged_dealer: knock back and damage the nearest enemy in range
 * - healer: heal the most injured ally in (reduced) range
 * - ranged_healer: heal an ally and poke an enemy with a damage-free knockback
 * - tank / dealer: nothing
 *
 * A body with no eligible target keeps its cooldown at zero and tries again
 * next tick.
 */
export class AbilitySystem {
  /**
   * Run abilities for all bodies, in body order.
   */
  update(bodies: readonly Body[], tuning: Readonly<Tuning>, ctx: CombatContext): void {
    for (const actor of bodies) {
      if (!actor.alive || actor.abilityCooldown > 0) continue;

      switch (actor.role) {
        case 'ranged_dealer':
          this.rangedAttack(actor, bodies, tuning, ctx);
          break;
        case 'healer':
          this.heal(actor, bodies, tuning, ctx);
          break;
        case 'ranged_healer':
          this.supportVolley(actor, bodies, tuning, ctx);
          break;
        case 'tank':
        case 'dealer':
          break;
      }
    }
  }

  /**
   * Nearest living enemy within maxRange. On equal distance the later body wins.
   */
  closestEnemy(actor: Body, bodies: readonly Body[], maxRange: number): Body | null {
    let closest: Body | null = null;
    let closestDistSq = maxRange * maxRange;

    for (const other of bodies) {
      if (!other.alive || other.team === actor.team) continue;
      const dx = other.x - actor.x;
      const dy = other.y - actor.y;
      const distSq = dx * dx + dy * dy;
      if (distSq <= closestDistSq) {
        closestDistSq = distSq;
        closest = other;
      }
    }

    return closest;
  }

  /**
   * Living ally within maxRange with the lowest hp ratio, ignoring allies at
   * full health. The actor itself counts as an ally.
   */
  weakestAlly(actor: Body, bodies: readonly Body[], maxRange: number): Body | null {
    let weakest: Body | null = null;
    let weakestRatio = Number.POSITIVE_INFINITY;
    const maxRangeSq = maxRange * maxRange;

    for (const other of bodies) {
      if (!other.alive || other.team !== actor.team) continue;
      if (other.hp >= other.maxHp) continue;
      const dx = other.x - actor.x;
      const dy = other.y - actor.y;
      if (dx * dx + dy * dy > maxRangeSq) continue;

      if (other.hpRatio < weakestRatio) {
        weakestRatio = other.hpRatio;
        weakest = other;
      }
    }

    return weakest;
  }

  private rangedAttack(
    actor: Body,
    bodies: readonly Body[],
    tuning: Readonly<Tuning>,
    ctx: CombatContext
  ): void {
    const target = this.closestEnemy(actor, bodies, tuning.rangedAttackRange * actor.rangeFactor);
    if (target === null) return;

    this.knockback(actor, target, tuning.rangedKnockbackForce, tuning, ctx);
    const damage = tuning.rangedDamage * Math.max(RANGED_DAMAGE_MIN_POWER, actor.power);
    const applied = inflictDamage(target, damage, actor.id, 'ranged', ctx);
    if (applied > 0) {
      target.lastDamage = Math.max(target.lastDamage, applied);
    }

    actor.abilityCooldown = tuning.rangedAttackCooldown;
  }

  private heal(actor: Body, bodies: readonly Body[], tuning: Readonly<Tuning>, ctx: CombatContext): void {
    const range = tuning.healerRange * HEALER_RANGE_FACTOR * actor.healRangeFactor;
    const target = this.weakestAlly(actor, bodies, range);
    if (target === null) return;

    this.restore(actor, target, tuning.healerAmount * HEALER_AMOUNT_FACTOR, ctx);
    actor.abilityCooldown = tuning.healerCooldown * actor.healCooldownFactor;
  }

  private supportVolley(
    actor: Body,
    bodies: readonly Body[],
    tuning: Readonly<Tuning>,
    ctx: CombatContext
  ): void {
    let acted = false;

    const healTarget = this.weakestAlly(actor, bodies, tuning.healerRange * actor.healRangeFactor);
    if (healTarget !== null) {
      this.restore(actor, healTarget, tuning.healerAmount * RANGED_HEALER_AMOUNT_FACTOR, ctx);
      acted = true;
    }

    const pokeRange = tuning.rangedAttackRange * RANGED_HEALER_POKE_RANGE_FACTOR * actor.rangeFactor;
    const pokeTarget = this.closestEnemy(actor, bodies, pokeRange);
    if (pokeTarget !== null) {
      this.knockback(actor, pokeTarget, tuning.rangedKnockbackForce * RANGED_HEALER_POKE_FORCE_FACTOR, tuning, ctx);
      acted = true;
    }

    if (acted) {
      actor.abilityCooldown = tuning.healerCooldown * actor.healCooldownFactor;
    }
  }

  private restore(actor: Body, target: Body, amount: number, ctx: CombatContext): void {
    const restored = target.heal(amount);
    ctx.emit({ type: 'heal', targetId: target.id, sourceId: actor.id, amount: restored });
  }

  /**
   * Push the target along the actor-to-target line with a slight upward bias
   * and stagger it briefly.
   */
  private knockback(
    actor: Body,
    target: Body,
    force: number,
    tuning: Readonly<Tuning>,
    ctx: CombatContext
  ): void {
    const dx = target.x - actor.x;
    const dy = target.y - actor.y;
    const distance = Math.hypot(dx, dy);

    let nx: number;
    let ny: number;
    if (distance <= TANGENT_EPSILON) {
      nx = Math.abs(actor.forwardDir) > EPSILON ? actor.forwardDir : 1;
      ny = 0;
    } else {
      nx = dx / distance;
      ny = dy / distance;
    }

    const speed = force / Math.max(EPSILON, target.mass);
    target.vx += nx * speed;
    target.vy += (ny * KNOCKBACK_NORMAL_LIFT - KNOCKBACK_LIFT_BIAS) * speed;
    target.staggerTimer = Math.max(
      target.staggerTimer,
      Math.min(tuning.maxStagger, tuning.staggerBase + KNOCKBACK_STAGGER_BONUS)
    );

    ctx.emit({ type: 'knockback', targetId: target.id, sourceId: actor.id });
  }
}

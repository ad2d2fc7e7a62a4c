import { Body } from './Body';
import { CombatContext, inflictDamage } from './combat';
import { Tuning } from './types';
import { EPSILON } from '../constants';

/**
 * Per-side result of an impact, before invincibility is applied
 */
export interface ImpactOutcome {
  incoming: number;
  recoil: number;
  launch: number;
  damage: number;
  stagger: number;
}

/**
 * ImpactSystem turns a new contact into combat consequences.
 *
 * Each side receives an "incoming strength" derived from the opponent's mass
 * and power relative to its own. From that strength follow a horizontal
 * recoil away from the opponent, an upward launch, damage and stagger. The
 * weaker side of an exchange gets the larger share of all four.
 */
export class ImpactSystem {
  /**
   * Strength of the blow the defender receives from the attacker.
   */
  incomingStrength(attacker: Body, defender: Body, tuning: Readonly<Tuning>): number {
    const powerRatio = Math.max(EPSILON, attacker.power) / Math.max(EPSILON, defender.power);
    const massRatio = attacker.mass / Math.max(EPSILON, defender.mass);
    const scaled =
      tuning.massPowerImpactScale * massRatio * Math.pow(powerRatio, tuning.powerRatioExponent);
    return Math.min(tuning.impactSpeedCap, scaled);
  }

  /**
   * Compute what the defender suffers from the attacker's blow.
   */
  outcome(attacker: Body, defender: Body, tuning: Readonly<Tuning>): ImpactOutcome {
    const incoming = this.incomingStrength(attacker, defender, tuning);
    return {
      incoming,
      recoil: tuning.minRecoilSpeed + incoming * tuning.recoilScale,
      launch: Math.min(
        tuning.maxLaunchSpeed,
        (tuning.minLaunchSpeed + incoming * tuning.launchScale) * tuning.launchHeightScale
      ),
      damage: tuning.damageBase + incoming * tuning.damageScale,
      stagger: Math.min(tuning.maxStagger, tuning.staggerBase + incoming * tuning.staggerScale),
    };
  }

  /**
   * Apply the effects of a first contact between a and b.
   *
   * @param nx - x component of the unit normal from a to b
   */
  apply(a: Body, b: Body, nx: number, tuning: Readonly<Tuning>, ctx: CombatContext): void {
    const onA = this.outcome(b, a, tuning);
    const onB = this.outcome(a, b, tuning);

    a.vx -= nx * (onA.recoil / a.mass);
    b.vx += nx * (onB.recoil / b.mass);
    a.vy -= onA.launch / a.mass;
    b.vy -= onB.launch / b.mass;

    const damageA = inflictDamage(a, onA.damage, b.id, 'impact', ctx);
    const damageB = inflictDamage(b, onB.damage, a.id, 'impact', ctx);
    a.lastDamage = damageA;
    b.lastDamage = damageB;

    a.staggerTimer = Math.max(a.staggerTimer, onA.stagger);
    b.staggerTimer = Math.max(b.staggerTimer, onB.stagger);

    ctx.emit({ type: 'impact', aId: a.id, bId: b.id, damageA, damageB });
  }
}

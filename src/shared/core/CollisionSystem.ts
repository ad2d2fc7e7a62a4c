import { Body } from './Body';
import { Tuning } from './types';
import { DEGENERATE_DISTANCE_SQ, EPSILON, TANGENT_EPSILON } from '../constants';

/**
 * Called the first time a pair is seen overlapping and approaching, at most
 * once per pair per tick and never while the pair stays in contact.
 *
 * @param nx - x component of the unit normal from a to b
 */
export type FirstContactHandler = (a: Body, b: Body, nx: number) => void;

export interface CollisionResult {
  /** Overlaps resolved, summed over all passes */
  collisions: number;
  /** Pair keys touching at any point during this tick */
  contacts: Set<string>;
}

/**
 * Order-independent key for a pair of bodies
 */
export function pairKey(aId: number, bId: number): string {
  return aId < bId ? `${aId}:${bId}` : `${bId}:${aId}`;
}

/**
 * Effective inverse mass used by the velocity solver.
 *
 * Dividing by power means a stronger body resists less of the impulse and
 * therefore pushes the weaker one harder. This does not conserve momentum.
 */
export function effectiveInverseMass(body: Body): number {
  return 1 / body.mass / Math.max(EPSILON, body.power);
}

/**
 * CollisionSystem resolves overlaps between opposing fighters.
 *
 * Only living bodies on different teams interact. Each pass walks every
 * unordered pair in body order, separates overlapping circles along the
 * contact normal and, if they are approaching, applies a restitution impulse
 * and a Coulomb friction impulse.
 */
export class CollisionSystem {
  /**
   * Run tuning.solverPasses passes over all pairs.
   *
   * @param bodies - all bodies, in id order
   * @param previousContacts - pair keys that were touching at the end of the last tick
   * @param onFirstContact - receives pairs that start touching this tick
   */
  resolve(
    bodies: readonly Body[],
    tuning: Readonly<Tuning>,
    previousContacts: ReadonlySet<string>,
    onFirstContact: FirstContactHandler
  ): CollisionResult {
    const contacts = new Set<string>();
    const impacted = new Set<string>();
    let collisions = 0;

    for (let pass = 0; pass < tuning.solverPasses; pass++) {
      for (let i = 0; i < bodies.length; i++) {
        const a = bodies[i];
        if (!a.alive) continue;

        for (let j = i + 1; j < bodies.length; j++) {
          const b = bodies[j];
          if (!b.alive || a.team === b.team) continue;

          const contact = this.resolvePair(a, b, tuning);
          if (contact === null) continue;

          collisions++;
          const key = pairKey(a.id, b.id);
          contacts.add(key);

          if (contact.relNormalSpeed < 0 && !previousContacts.has(key) && !impacted.has(key)) {
            impacted.add(key);
            onFirstContact(a, b, contact.nx);
            if (!a.alive) break;
          }
        }
      }
    }

    return { collisions, contacts };
  }

  /**
   * Separate and bounce one pair.
   *
   * @returns null if the pair does not overlap, otherwise the contact normal's
   *   x component and the relative normal speed measured before the impulse
   */
  private resolvePair(
    a: Body,
    b: Body,
    tuning: Readonly<Tuning>
  ): { nx: number; relNormalSpeed: number } | null {
    const dx = b.x - a.x;
    const dy = b.y - a.y;
    const radii = a.radius + b.radius;
    const distanceSq = dx * dx + dy * dy;
    if (distanceSq >= radii * radii) {
      return null;
    }

    let nx: number;
    let ny: number;
    let distance: number;
    if (distanceSq <= DEGENERATE_DISTANCE_SQ) {
      // Coincident centers: pick a fixed axis so replays stay identical
      nx = (a.id + b.id) % 2 === 0 ? 1 : -1;
      ny = 0;
      distance = radii;
    } else {
      distance = Math.sqrt(distanceSq);
      nx = dx / distance;
      ny = dy / distance;
    }

    const invMassA = 1 / a.mass;
    const invMassB = 1 / b.mass;

    const penetration = radii - distance;
    const correction = (penetration / (invMassA + invMassB)) * tuning.positionCorrection;
    a.x -= nx * correction * invMassA;
    a.y -= ny * correction * invMassA;
    b.x += nx * correction * invMassB;
    b.y += ny * correction * invMassB;

    const relVx = b.vx - a.vx;
    const relVy = b.vy - a.vy;
    const relNormalSpeed = relVx * nx + relVy * ny;

    if (relNormalSpeed < 0) {
      const wA = effectiveInverseMass(a);
      const wB = effectiveInverseMass(b);
      const wSum = wA + wB;

      const impulse = ((-(1 + tuning.restitution) * relNormalSpeed) / wSum) * tuning.collisionBoost;
      a.vx -= impulse * nx * wA;
      a.vy -= impulse * ny * wA;
      b.vx += impulse * nx * wB;
      b.vy += impulse * ny * wB;

      let tx = relVx - relNormalSpeed * nx;
      let ty = relVy - relNormalSpeed * ny;
      const tangentLength = Math.hypot(tx, ty);
      if (tangentLength > TANGENT_EPSILON) {
        tx /= tangentLength;
        ty /= tangentLength;
        const limit = Math.abs(impulse) * tuning.friction;
        const frictionImpulse = Math.max(-limit, Math.min(limit, -(relVx * tx + relVy * ty) / wSum));

        a.vx -= frictionImpulse * tx * wA;
        a.vy -= frictionImpulse * ty * wA;
        b.vx += frictionImpulse * tx * wB;
        b.vy += frictionImpulse * ty * wB;
      }
    }

    return { nx, relNormalSpeed };
  }
}

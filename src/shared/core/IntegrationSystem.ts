import { Body } from './Body';
import { Tuning } from './types';
import { EPSILON } from '../constants';

/**
 * IntegrationSystem moves every body independently of the others.
 *
 * Responsibilities:
 * - Count down stagger and ability cooldown timers
 * - Apply forward drive, gravity, damping and ground friction
 * - Integrate position (semi-implicit Euler)
 * - Bounce bodies off the arena walls, ceiling and floor
 * - Let dead bodies fall to the floor and stay there
 *
 * The arena spans [0, width] x [0, height] with y growing downward, so the
 * floor is at y = height.
 */
export class IntegrationSystem {
  private readonly width: number;
  private readonly height: number;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
  }

  /**
   * Advance one body by dt seconds.
   */
  integrate(body: Body, tuning: Readonly<Tuning>, dt: number): void {
    body.lastDamage = 0;

    if (!body.alive) {
      this.settleDeadBody(body, tuning, dt);
      return;
    }

    if (body.staggerTimer > 0) {
      body.staggerTimer = Math.max(0, body.staggerTimer - dt);
    }
    if (body.abilityCooldown > 0) {
      body.abilityCooldown = Math.max(0, body.abilityCooldown - dt);
    }

    const onGround = this.isGrounded(body, tuning);

    let driveForce = tuning.approachForce * body.power;
    if (body.staggerTimer > 0) {
      driveForce *= tuning.staggerDriveMultiplier;
    }

    const ax = (body.forwardDir * driveForce) / body.mass;
    let ay = tuning.gravity;
    if (onGround && body.vy >= 0) {
      ay = 0;
      body.vy = 0;
    }

    const damping = Math.max(0, 1 - tuning.linearDamping * dt);
    body.vx = (body.vx + ax * dt) * damping;
    body.vy = (body.vy + ay * dt) * damping;

    if (onGround) {
      body.vx *= Math.max(0, 1 - tuning.groundFriction * dt);
    }

    body.x += body.vx * dt;
    body.y += body.vy * dt;

    this.resolveWalls(body, tuning);
  }

  /**
   * A body is grounded when it touches the floor and is not moving
   * vertically faster than the snap speed.
   */
  isGrounded(body: Body, tuning: Readonly<Tuning>): boolean {
    const groundY = this.height - body.radius;
    return body.y >= groundY - EPSILON && Math.abs(body.vy) <= tuning.groundSnapSpeed;
  }

  /**
   * Push a body back inside the arena and reflect the velocity component
   * that crossed the boundary.
   */
  resolveWalls(body: Body, tuning: Readonly<Tuning>): void {
    const r = body.radius;
    const restitution = tuning.wallRestitution;
    const tangentKeep = Math.max(0, 1 - tuning.wallFriction);

    if (body.x - r < 0) {
      body.x = r;
      if (body.vx < 0) {
        body.vx = -body.vx * restitution;
        body.vy *= tangentKeep;
      }
    } else if (body.x + r > this.width) {
      body.x = this.width - r;
      if (body.vx > 0) {
        body.vx = -body.vx * restitution;
        body.vy *= tangentKeep;
      }
    }

    if (body.y - r < 0) {
      body.y = r;
      if (body.vy < 0) {
        body.vy = -body.vy * restitution;
        body.vx *= tangentKeep;
      }
    } else if (body.y + r > this.height) {
      body.y = this.height - r;
      // Slow landings snap to rest instead of jittering on the floor
      if (body.vy > tuning.groundSnapSpeed) {
        body.vy = -body.vy * restitution;
      } else {
        body.vy = 0;
      }
      body.vx *= Math.max(0, 1 - tuning.groundFriction);
    }
  }

  private settleDeadBody(body: Body, tuning: Readonly<Tuning>, dt: number): void {
    body.vx = 0;
    body.staggerTimer = 0;
    body.abilityCooldown = 0;

    const floorY = this.height - body.radius;
    if (body.y >= floorY - EPSILON) {
      body.y = floorY;
      body.vy = 0;
      return;
    }

    body.vy = Math.max(0, Math.max(0, body.vy) + tuning.gravity * dt);
    body.y += body.vy * dt;

    if (body.y >= floorY) {
      body.y = floorY;
      body.vy = 0;
    }
    body.x = Math.min(this.width - body.radius, Math.max(body.radius, body.x));
    body.y = Math.max(body.radius, body.y);
  }
}

import { CollisionSystem, effectiveInverseMass, pairKey } from './CollisionSystem';
import { Body } from './Body';
import { createTuning } from './tuning';
import { BodyInit, Tuning } from './types';

describe('CollisionSystem', () => {
  let collision: CollisionSystem;
  let onFirstContact: jest.Mock;

  const createBody = (overrides: Partial<BodyInit> = {}): Body =>
    new Body({
      id: 0,
      team: 'left',
      x: 100,
      y: 50,
      radius: 10,
      mass: 1,
      ...overrides,
    });

  const createTuningFor = (overrides: Partial<Tuning> = {}): Readonly<Tuning> =>
    createTuning({ friction: 0, restitution: 1, solverPasses: 1, positionCorrection: 1, ...overrides });

  beforeEach(() => {
    collision = new CollisionSystem();
    onFirstContact = jest.fn();
  });

  describe('pairKey', () => {
    it('should not depend on argument order', () => {
      expect(pairKey(3, 1)).toBe('1:3');
      expect(pairKey(1, 3)).toBe('1:3');
    });
  });

  describe('effectiveInverseMass', () => {
    it('should divide the inverse mass by power', () => {
      expect(effectiveInverseMass(createBody({ mass: 2, power: 4 }))).toBe(0.125);
    });
  });

  describe('resolve', () => {
    it('should ignore bodies that do not overlap', () => {
      const a = createBody({ id: 0, x: 100 });
      const b = createBody({ id: 1, team: 'right', x: 125 });

      const result = collision.resolve([a, b], createTuningFor(), new Set(), onFirstContact);

      expect(result.collisions).toBe(0);
      expect(result.contacts.size).toBe(0);
    });

    it('should never resolve same-team pairs', () => {
      const a = createBody({ id: 0, x: 100, vx: 10 });
      const b = createBody({ id: 1, x: 105, vx: -10 });

      const result = collision.resolve([a, b], createTuningFor(), new Set(), onFirstContact);

      expect(result.collisions).toBe(0);
      expect(a.x).toBe(100);
      expect(b.x).toBe(105);
      expect(a.vx).toBe(10);
      expect(b.vx).toBe(-10);
      expect(onFirstContact).not.toHaveBeenCalled();
    });

    it('should skip dead bodies', () => {
      const a = createBody({ id: 0, x: 100, hp: 0 });
      const b = createBody({ id: 1, team: 'right', x: 105 });

      const result = collision.resolve([a, b], createTuningFor(), new Set(), onFirstContact);

      expect(result.collisions).toBe(0);
      expect(a.x).toBe(100);
    });

    it('should separate overlapping bodies by inverse mass', () => {
      const a = createBody({ id: 0, x: 100 });
      const b = createBody({ id: 1, team: 'right', x: 115 });

      const result = collision.resolve([a, b], createTuningFor(), new Set(), onFirstContact);

      expect(result.collisions).toBe(1);
      expect(result.contacts).toEqual(new Set(['0:1']));
      expect(a.x).toBeCloseTo(97.5);
      expect(b.x).toBeCloseTo(117.5);
    });

    it('should move the lighter body further', () => {
      const a = createBody({ id: 0, x: 100, mass: 3 });
      const b = createBody({ id: 1, team: 'right', x: 116 });

      collision.resolve([a, b], createTuningFor(), new Set(), onFirstContact);

      expect(a.x).toBeCloseTo(99);
      expect(b.x).toBeCloseTo(119);
    });

    it('should count an overlap on every pass it persists', () => {
      const a = createBody({ id: 0, x: 100 });
      const b = createBody({ id: 1, team: 'right', x: 115 });

      const result = collision.resolve(
        [a, b],
        createTuningFor({ solverPasses: 3, positionCorrection: 0.5 }),
        new Set(),
        onFirstContact
      );

      expect(result.collisions).toBe(3);
      expect(b.x - a.x).toBeCloseTo(19.375);
    });

    it('should bounce approaching equal bodies', () => {
      const a = createBody({ id: 0, x: 100, vx: 10 });
      const b = createBody({ id: 1, team: 'right', x: 115, vx: -10 });

      collision.resolve([a, b], createTuningFor(), new Set(), onFirstContact);

      expect(a.vx).toBeCloseTo(-10);
      expect(b.vx).toBeCloseTo(10);
    });

    it('should leave separating bodies alone', () => {
      const a = createBody({ id: 0, x: 100, vx: -10 });
      const b = createBody({ id: 1, team: 'right', x: 115, vx: 10 });

      collision.resolve([a, b], createTuningFor(), new Set(), onFirstContact);

      expect(a.vx).toBe(-10);
      expect(b.vx).toBe(10);
      expect(onFirstContact).not.toHaveBeenCalled();
    });

    it('should let the stronger body keep more of its velocity', () => {
      const weak = createBody({ id: 0, x: 100, vx: 10, power: 1 });
      const strong = createBody({ id: 1, team: 'right', x: 115, vx: -10, power: 3 });

      collision.resolve([weak, strong], createTuningFor({ restitution: 0 }), new Set(), onFirstContact);

      // impulse = 20 / (1 + 1/3) = 15
      expect(weak.vx).toBeCloseTo(-5);
      expect(strong.vx).toBeCloseTo(-5);
    });

    it('should apply friction along the tangent', () => {
      const a = createBody({ id: 0, x: 100, vx: 10, vy: 4 });
      const b = createBody({ id: 1, team: 'right', x: 115, vx: -10 });

      collision.resolve([a, b], createTuningFor({ restitution: 0, friction: 1 }), new Set(), onFirstContact);

      // Normal impulse 10 caps friction at 10; the tangential slip of 4 needs only 2
      expect(a.vy).toBeCloseTo(2);
      expect(b.vy).toBeCloseTo(2);
    });

    it('should scale the impulse by collisionBoost', () => {
      const a = createBody({ id: 0, x: 100, vx: 10 });
      const b = createBody({ id: 1, team: 'right', x: 115, vx: -10 });

      collision.resolve([a, b], createTuningFor({ restitution: 0, collisionBoost: 2 }), new Set(), onFirstContact);

      expect(a.vx).toBeCloseTo(-10);
      expect(b.vx).toBeCloseTo(10);
    });

    it('should pick an id-parity axis for coincident centers', () => {
      const a = createBody({ id: 0, x: 100 });
      const b = createBody({ id: 1, team: 'right', x: 100, vx: 5 });

      collision.resolve([a, b], createTuningFor(), new Set(), onFirstContact);

      expect(onFirstContact).toHaveBeenCalledWith(a, b, -1);
    });
  });

  describe('first contact', () => {
    it('should fire once for an approaching pair across all passes', () => {
      const a = createBody({ id: 0, x: 100, vx: 10 });
      const b = createBody({ id: 1, team: 'right', x: 115, vx: -10 });

      const result = collision.resolve(
        [a, b],
        createTuningFor({ solverPasses: 3, positionCorrection: 0.8 }),
        new Set(),
        onFirstContact
      );

      expect(result.collisions).toBe(3);
      expect(onFirstContact).toHaveBeenCalledTimes(1);
      expect(onFirstContact).toHaveBeenCalledWith(a, b, 1);
    });

    it('should not fire for a pair already touching last tick', () => {
      const a = createBody({ id: 0, x: 100, vx: 10 });
      const b = createBody({ id: 1, team: 'right', x: 115, vx: -10 });

      collision.resolve([a, b], createTuningFor(), new Set(['0:1']), onFirstContact);

      expect(onFirstContact).not.toHaveBeenCalled();
      expect(a.vx).toBeCloseTo(-10);
    });

    it('should stop resolving a body killed by its first contact', () => {
      const a = createBody({ id: 0, x: 100, vx: 10 });
      const b = createBody({ id: 1, team: 'right', x: 115 });
      const c = createBody({ id: 2, team: 'right', x: 85 });
      onFirstContact.mockImplementation((first: Body) => first.takeDamage(1000));

      const result = collision.resolve(
        [a, b, c],
        createTuningFor({ solverPasses: 3 }),
        new Set(),
        onFirstContact
      );

      expect(result.collisions).toBe(1);
      expect(result.contacts).toEqual(new Set(['0:1']));
      expect(c.x).toBe(85);
    });
  });
});

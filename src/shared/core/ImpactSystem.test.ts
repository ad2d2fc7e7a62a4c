import { ImpactSystem } from './ImpactSystem';
import { Body } from './Body';
import { CombatContext } from './combat';
import { InvincibleTeams } from './InvincibleTeams';
import { createTuning } from './tuning';
import { BodyInit, SimulationEvent } from './types';
import { DEFAULT_TUNING } from '../constants';

describe('ImpactSystem', () => {
  let impact: ImpactSystem;
  let events: SimulationEvent[];
  let ctx: CombatContext;

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

  beforeEach(() => {
    impact = new ImpactSystem();
    events = [];
    ctx = { invincible: new InvincibleTeams(), emit: (event) => events.push(event) };
  });

  describe('incomingStrength', () => {
    it('should equal the scale for identical bodies', () => {
      const a = createBody();
      const b = createBody({ id: 1, team: 'right' });

      expect(impact.incomingStrength(a, b, DEFAULT_TUNING)).toBeCloseTo(120);
    });

    it('should grow with the attacker power ratio', () => {
      const weak = createBody({ power: 1 });
      const strong = createBody({ id: 1, team: 'right', power: 4 });

      expect(impact.incomingStrength(strong, weak, DEFAULT_TUNING)).toBeCloseTo(240);
      expect(impact.incomingStrength(weak, strong, DEFAULT_TUNING)).toBeCloseTo(60);
    });

    it('should be capped by impactSpeedCap', () => {
      const heavy = createBody({ mass: 2 });
      const light = createBody({ id: 1, team: 'right' });
      const tuning = createTuning({ massPowerImpactScale: 1000 });

      expect(impact.incomingStrength(heavy, light, tuning)).toBe(1400);
    });
  });

  describe('outcome', () => {
    it('should derive recoil, launch, damage and stagger from the default tuning', () => {
      const a = createBody();
      const b = createBody({ id: 1, team: 'right' });

      const outcome = impact.outcome(a, b, DEFAULT_TUNING);

      expect(outcome.recoil).toBeCloseTo(119.4);
      expect(outcome.launch).toBeCloseTo(144);
      expect(outcome.damage).toBeCloseTo(4.86);
      expect(outcome.stagger).toBeCloseTo(0.204);
    });

    it('should cap launch and stagger', () => {
      const a = createBody();
      const b = createBody({ id: 1, team: 'right' });
      const tuning = createTuning({ launchScale: 100, staggerScale: 1 });

      const outcome = impact.outcome(a, b, tuning);

      expect(outcome.launch).toBe(820);
      expect(outcome.stagger).toBe(1.2);
    });
  });

  describe('apply', () => {
    it('should push equal bodies apart and launch both upward', () => {
      const a = createBody();
      const b = createBody({ id: 1, team: 'right', x: 115 });

      impact.apply(a, b, 1, DEFAULT_TUNING, ctx);

      expect(a.vx).toBeCloseTo(-119.4);
      expect(b.vx).toBeCloseTo(119.4);
      expect(a.vy).toBeCloseTo(-144);
      expect(b.vy).toBeCloseTo(-144);
      expect(a.hp).toBeCloseTo(95.14);
      expect(b.hp).toBeCloseTo(95.14);
      expect(a.staggerTimer).toBeCloseTo(0.204);
      expect(a.lastDamage).toBeCloseTo(4.86);
    });

    it('should hurt the weaker body more', () => {
      const weak = createBody({ power: 1 });
      const strong = createBody({ id: 1, team: 'right', x: 115, power: 4 });

      impact.apply(weak, strong, 1, DEFAULT_TUNING, ctx);

      // incoming 240 on the weak side, 60 on the strong side
      expect(weak.hp).toBeCloseTo(100 - 8.22);
      expect(strong.hp).toBeCloseTo(100 - 3.18);
      expect(Math.abs(weak.vx)).toBeGreaterThan(Math.abs(strong.vx));
    });

    it('should divide recoil and launch by mass', () => {
      const a = createBody({ mass: 2 });
      const b = createBody({ id: 1, team: 'right', mass: 2 });

      impact.apply(a, b, -1, DEFAULT_TUNING, ctx);

      expect(a.vx).toBeCloseTo(59.7);
      expect(b.vx).toBeCloseTo(-59.7);
      expect(a.vy).toBeCloseTo(-72);
    });

    it('should keep the longer stagger', () => {
      const a = createBody({ staggerTimer: 1 });
      const b = createBody({ id: 1, team: 'right' });

      impact.apply(a, b, 1, DEFAULT_TUNING, ctx);

      expect(a.staggerTimer).toBe(1);
    });

    it('should spare invincible teams but still push them', () => {
      const a = createBody();
      const b = createBody({ id: 1, team: 'right' });
      ctx.invincible.set(['left']);

      impact.apply(a, b, 1, DEFAULT_TUNING, ctx);

      expect(a.hp).toBe(100);
      expect(a.lastDamage).toBe(0);
      expect(a.vx).toBeCloseTo(-119.4);
      expect(b.hp).toBeCloseTo(95.14);
    });

    it('should emit damage events then the impact event', () => {
      const a = createBody();
      const b = createBody({ id: 1, team: 'right' });

      impact.apply(a, b, 1, DEFAULT_TUNING, ctx);

      expect(events.map((event) => event.type)).toEqual(['damage', 'damage', 'impact']);
      expect(events[2]).toEqual({
        type: 'impact',
        aId: 0,
        bId: 1,
        damageA: expect.closeTo(4.86, 5),
        damageB: expect.closeTo(4.86, 5),
      });
    });

    it('should report a kill', () => {
      const a = createBody({ hp: 2 });
      const b = createBody({ id: 1, team: 'right' });

      impact.apply(a, b, 1, DEFAULT_TUNING, ctx);

      expect(a.alive).toBe(false);
      expect(events).toContainEqual({ type: 'death', bodyId: 0, team: 'left' });
    });
  });
});

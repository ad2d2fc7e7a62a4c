import { inflictDamage, CombatContext } from './combat';
import { Body } from './Body';
import { InvincibleTeams } from './InvincibleTeams';
import { SimulationEvent } from './types';

describe('inflictDamage', () => {
  let events: SimulationEvent[];
  let ctx: CombatContext;

  const createBody = (hp = 100): Body =>
    new Body({ id: 4, team: 'monster', x: 0, y: 0, radius: 5, mass: 1, hp });

  beforeEach(() => {
    events = [];
    ctx = { invincible: new InvincibleTeams(), emit: (event) => events.push(event) };
  });

  it('should apply damage and emit a damage event', () => {
    const target = createBody();

    const applied = inflictDamage(target, 12, 1, 'ranged', ctx);

    expect(applied).toBe(12);
    expect(target.hp).toBe(88);
    expect(events).toEqual([{ type: 'damage', targetId: 4, sourceId: 1, amount: 12, cause: 'ranged' }]);
  });

  it('should emit a death event for a lethal hit', () => {
    const target = createBody(5);

    inflictDamage(target, 10, 1, 'impact', ctx);

    expect(events[1]).toEqual({ type: 'death', bodyId: 4, team: 'monster' });
  });

  it('should do nothing to an invincible team', () => {
    const target = createBody();
    ctx.invincible.set(['Monster']);

    const applied = inflictDamage(target, 12, 1, 'impact', ctx);

    expect(applied).toBe(0);
    expect(target.hp).toBe(100);
    expect(events).toEqual([]);
  });

  it('should do nothing to a dead target', () => {
    const target = createBody(0);

    expect(inflictDamage(target, 12, 1, 'impact', ctx)).toBe(0);
    expect(events).toEqual([]);
  });

  it('should ignore non-positive amounts', () => {
    expect(inflictDamage(createBody(), 0, 1, 'impact', ctx)).toBe(0);
    expect(events).toEqual([]);
  });
});

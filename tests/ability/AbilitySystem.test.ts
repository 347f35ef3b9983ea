import { describe, it, expect } from 'vitest';
import { AbilitySystem } from '@/engine/systems/ability/AbilitySystem';
import { addUnit, makeCtx, makeState, record } from '../integration/helpers';

describe('AbilitySystem.run timer', () => {
  it('a medic heals every 10th tick', () => {
    const state = makeState();
    const medic = addUnit(state, 'blue', 'medic', 5, 4, { hp: 50 });
    const ctx = makeCtx(state);

    for (let t = 1; t <= 9; t++) expect(AbilitySystem.run(state, ctx, medic)).toBe(false);
    expect(medic.hp).toBe(50);
    expect(medic.abilityTimer).toBe(1);

    expect(AbilitySystem.run(state, ctx, medic)).toBe(true);
    expect(medic.hp).toBe(52);
    expect(medic.abilityTimer).toBe(10);
  });

  it('roles without an ability never fire', () => {
    const state = makeState();
    const grunt = addUnit(state, 'blue', 'infantry', 5, 4);
    expect(AbilitySystem.run(state, makeCtx(state), grunt)).toBe(false);
    expect(grunt.abilityTimer).toBe(0);
  });

  it('a dead unit does nothing', () => {
    const state = makeState();
    const medic = addUnit(state, 'blue', 'medic', 5, 4, { hp: 0, abilityTimer: 1 });
    expect(AbilitySystem.run(state, makeCtx(state), medic)).toBe(false);
  });
});

describe('heal', () => {
  it('tops up allies in radius, capped at max health', () => {
    const state = makeState();
    const medic = addUnit(state, 'blue', 'medic', 5, 4, { abilityTimer: 1 });
    const near = addUnit(state, 'blue', 'infantry', 6, 5, { hp: 99 });
    const far = addUnit(state, 'blue', 'infantry', 8, 4, { hp: 50 });
    const enemy = addUnit(state, 'red', 'infantry', 5, 5, { hp: 50 });

    AbilitySystem.run(state, makeCtx(state), medic);

    expect(medic.hp).toBe(80);
    expect(near.hp).toBe(100);
    expect(far.hp).toBe(50);
    expect(enemy.hp).toBe(50);
  });
});

describe('auras', () => {
  it('a shieldbearer covers allies but not itself', () => {
    const state = makeState();
    const bearer = addUnit(state, 'red', 'shieldbearer', 5, 4);
    const ally = addUnit(state, 'red', 'infantry', 5, 6);
    const outside = addUnit(state, 'red', 'infantry', 5, 7);

    AbilitySystem.run(state, makeCtx(state), bearer);

    expect(bearer.damageReduction).toBe(0);
    expect(ally.damageReduction).toBe(0.5);
    expect(outside.damageReduction).toBe(0);
  });

  it('a commander rallies allies but not itself', () => {
    const state = makeState();
    const commander = addUnit(state, 'blue', 'commander', 5, 4);
    const ally = addUnit(state, 'blue', 'infantry', 4, 3);
    const enemy = addUnit(state, 'red', 'infantry', 6, 4);

    AbilitySystem.run(state, makeCtx(state), commander);

    expect(commander.rallyBonus).toBe(0);
    expect(ally.rallyBonus).toBe(0.25);
    expect(enemy.rallyBonus).toBe(0);
  });

  it('resetAuras clears both auras', () => {
    const state = makeState();
    const unit = addUnit(state, 'blue', 'infantry', 5, 4, { damageReduction: 0.5, rallyBonus: 0.25 });
    AbilitySystem.resetAuras(state);
    expect(unit.damageReduction).toBe(0);
    expect(unit.rallyBonus).toBe(0);
  });
});

describe('repair', () => {
  // Blue HQ footprint is (0..1, 3..4)
  it('restores HQ health within radius', () => {
    const state = makeState();
    state.hqs.blue.hp = 400;
    const bot = addUnit(state, 'blue', 'repairbot', 2, 3, { abilityTimer: 1 });

    expect(AbilitySystem.run(state, makeCtx(state), bot)).toBe(true);
    expect(state.hqs.blue.hp).toBe(402);
  });

  it('does nothing from too far away', () => {
    const state = makeState();
    state.hqs.blue.hp = 400;
    const bot = addUnit(state, 'blue', 'repairbot', 5, 3, { abilityTimer: 1 });

    AbilitySystem.run(state, makeCtx(state), bot);
    expect(state.hqs.blue.hp).toBe(400);
  });

  it('does not overfill or touch the enemy HQ', () => {
    const state = makeState();
    state.hqs.red.hp = 300;
    const bot = addUnit(state, 'blue', 'repairbot', 1, 5, { abilityTimer: 1 });

    AbilitySystem.run(state, makeCtx(state), bot);
    expect(state.hqs.blue.hp).toBe(500);
    expect(state.hqs.red.hp).toBe(300);
  });
});

describe('wall', () => {
  it('walls off the only open neighbour', () => {
    const state = makeState();
    const engineer = addUnit(state, 'blue', 'engineer', 5, 4, { abilityTimer: 1 });
    addUnit(state, 'blue', 'infantry', 6, 4);
    addUnit(state, 'blue', 'infantry', 4, 4);
    addUnit(state, 'blue', 'infantry', 5, 5);
    const ctx = makeCtx(state);
    const walls = record(ctx.bus, 'wallPlaced');

    expect(AbilitySystem.run(state, ctx, engineer)).toBe(true);

    expect(state.grid.terrain[3]?.[5]).toBe('wall');
    expect(walls).toEqual([{ tick: 1, unitId: engineer.id, x: 5, y: 3 }]);
    expect(engineer.abilityTimer).toBe(50);
  });
});

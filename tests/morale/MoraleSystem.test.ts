import { describe, it, expect } from 'vitest';
import { MoraleSystem } from '@/engine/systems/morale/MoraleSystem';
import { addUnit, makeCtx, makeState } from '../integration/helpers';

describe('MoraleSystem.delta', () => {
  it('weighs allies +1 and enemies −2', () => {
    expect(MoraleSystem.delta(3, 0, true)).toBe(3);
    expect(MoraleSystem.delta(2, 1, true)).toBe(0);
    expect(MoraleSystem.delta(1, 2, true)).toBe(-3);
  });

  it('an unsupplied unit can only hold or lose morale', () => {
    expect(MoraleSystem.delta(3, 0, false)).toBe(0);
    expect(MoraleSystem.delta(0, 2, false)).toBe(-4);
  });
});

describe('MoraleSystem.classify', () => {
  it('splits at 20 and 40', () => {
    expect(MoraleSystem.classify({ morale: 19 })).toBe('routed');
    expect(MoraleSystem.classify({ morale: 20 })).toBe('wavering');
    expect(MoraleSystem.classify({ morale: 39 })).toBe('wavering');
    expect(MoraleSystem.classify({ morale: 40 })).toBe('steady');
  });
});

describe('MoraleSystem.update', () => {
  it('clamps at 100', () => {
    const state = makeState();
    const centre = addUnit(state, 'blue', 'infantry', 5, 4, { morale: 99 });
    addUnit(state, 'blue', 'infantry', 6, 4);
    addUnit(state, 'blue', 'infantry', 4, 4);
    addUnit(state, 'blue', 'infantry', 5, 5);

    MoraleSystem.update(state, makeCtx(state));
    expect(centre.morale).toBe(100);
  });

  it('clamps at 0', () => {
    const state = makeState();
    const victim = addUnit(state, 'blue', 'infantry', 5, 4, { morale: 5 });
    addUnit(state, 'red', 'infantry', 6, 4);
    addUnit(state, 'red', 'infantry', 4, 4);

    MoraleSystem.update(state, makeCtx(state));
    expect(victim.morale).toBe(1);

    MoraleSystem.update(state, makeCtx(state));
    expect(victim.morale).toBe(0);
  });

  it('diagonal neighbours do not count', () => {
    const state = makeState();
    const unit = addUnit(state, 'blue', 'infantry', 5, 4);
    addUnit(state, 'red', 'infantry', 6, 5);

    MoraleSystem.update(state, makeCtx(state));
    expect(unit.morale).toBe(70);
  });
});

describe('MoraleSystem.applyDeathShock', () => {
  it('hits allies at distance exactly 1', () => {
    const state = makeState();
    const victim = addUnit(state, 'blue', 'infantry', 5, 4);
    const beside = addUnit(state, 'blue', 'infantry', 6, 4);
    const further = addUnit(state, 'blue', 'infantry', 7, 4);
    const enemy = addUnit(state, 'red', 'infantry', 4, 4);

    MoraleSystem.applyDeathShock(state, victim);

    expect(beside.morale).toBe(60);
    expect(further.morale).toBe(70);
    expect(enemy.morale).toBe(70);
  });

  it('a dead commander shakes the whole faction', () => {
    const state = makeState();
    const commander = addUnit(state, 'blue', 'commander', 5, 4);
    const far = addUnit(state, 'blue', 'infantry', 11, 0);
    const low = addUnit(state, 'blue', 'infantry', 0, 7, { morale: 10 });

    MoraleSystem.applyDeathShock(state, commander);

    expect(far.morale).toBe(45);
    expect(low.morale).toBe(0);
  });
});

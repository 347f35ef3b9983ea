import { describe, it, expect } from 'vitest';
import { WeatherSystem } from '@/engine/systems/weather/WeatherSystem';
import { WEATHER_KINDS } from '@/engine/data/types/Weather';
import type { WeatherKind } from '@/engine/data/types/Weather';
import { SimRng } from '@/engine/utils/SimRng';
import { makeCtx, makeState, record } from '../integration/helpers';

describe('WeatherSystem.initial', () => {
  it('defaults to clear, unlocked, 100 ticks', () => {
    expect(WeatherSystem.initial()).toEqual({ kind: 'clear', ticksRemaining: 100, locked: false });
    expect(WeatherSystem.initial('storm', true)).toEqual({ kind: 'storm', ticksRemaining: 100, locked: true });
  });
});

describe('WeatherSystem.update', () => {
  it('locked weather never changes', () => {
    const state = makeState({ weather: 'fog' });
    const ctx = makeCtx(state);
    for (let t = 0; t < 250; t++) WeatherSystem.update(state, ctx);
    expect(state.weather).toEqual({ kind: 'fog', ticksRemaining: 100, locked: true });
  });

  it('counts down one tick at a time', () => {
    const state = makeState();
    state.weather.locked = false;
    WeatherSystem.update(state, makeCtx(state));
    expect(state.weather.ticksRemaining).toBe(99);
  });

  it('rolls a new kind when the countdown runs out', () => {
    const expected = new SimRng('sky').pick(WEATHER_KINDS);
    if (!expected) throw new Error('empty weather table');
    const other: WeatherKind = expected === 'clear' ? 'storm' : 'clear';

    const state = makeState({ weather: other });
    state.weather.locked = false;
    state.weather.ticksRemaining = 1;
    const ctx = makeCtx(state, 42, 'sky');
    const changes = record(ctx.bus, 'weatherChanged');

    WeatherSystem.update(state, ctx);

    expect(state.weather.kind).toBe(expected);
    expect(state.weather.ticksRemaining).toBe(100);
    expect(changes).toEqual([{ tick: 42, kind: expected }]);
  });

  it('rolling the same kind again is not announced', () => {
    const expected = new SimRng('sky').pick(WEATHER_KINDS);
    if (!expected) throw new Error('empty weather table');

    const state = makeState({ weather: expected });
    state.weather.locked = false;
    state.weather.ticksRemaining = 1;
    const ctx = makeCtx(state, 42, 'sky');
    const changes = record(ctx.bus, 'weatherChanged');

    WeatherSystem.update(state, ctx);

    expect(state.weather.kind).toBe(expected);
    expect(state.weather.ticksRemaining).toBe(100);
    expect(changes).toEqual([]);
  });
});

describe('WeatherSystem.moveCooldown', () => {
  const base = () => new SimRng('cadence').int(5, 10);
  const roll = (weather: WeatherKind, rallyBonus = 0) =>
    WeatherSystem.moveCooldown(new SimRng('cadence'), weather, { rallyBonus });

  it('clear and fog leave the cadence alone', () => {
    expect(roll('clear')).toBe(base());
    expect(roll('fog')).toBe(base());
  });

  it('rain and storm stretch it', () => {
    expect(roll('rain')).toBe(Math.ceil(base() * 1.5));
    expect(roll('storm')).toBe(base() * 2);
  });

  it('a rallied unit moves more often', () => {
    expect(roll('clear', 0.25)).toBe(Math.ceil(base() * 0.75));
    expect(roll('storm', 0.25)).toBe(Math.ceil(base() * 1.5));
  });
});

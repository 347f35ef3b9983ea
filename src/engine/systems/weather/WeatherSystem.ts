// ─────────────────────────────────────────────
//  Weather System
//  Fog shortens sight; rain and storms slow movement; storms also
//  lengthen attack cooldowns (see DamageCalc).
// ─────────────────────────────────────────────

import type { SimState } from '@/engine/state/SimState';
import type { TickContext } from '@/engine/state/TickContext';
import type { WeatherKind, WeatherState } from '@/engine/data/types/Weather';
import { WEATHER_KINDS } from '@/engine/data/types/Weather';
import type { UnitState } from '@/engine/data/types/Unit';
import type { SimRng } from '@/engine/utils/SimRng';
import { SIM } from '@/config';

const COOLDOWN_SCALE: Record<WeatherKind, number> = {
  clear: 1,
  fog: 1,
  rain: SIM.RAIN_COOLDOWN_SCALE,
  storm: SIM.STORM_COOLDOWN_SCALE,
};

export const WeatherSystem = {
  initial(kind: WeatherKind = 'clear', locked = false): WeatherState {
    return { kind, ticksRemaining: SIM.WEATHER_DURATION, locked };
  },

  /**
   * Fresh movement cooldown for a unit that just moved: a random
   * cadence, stretched by weather and shortened by a commander's rally.
   */
  moveCooldown(rng: SimRng, weather: WeatherKind, unit: Pick<UnitState, 'rallyBonus'>): number {
    const base = rng.int(SIM.MOVE_COOLDOWN_MIN, SIM.MOVE_COOLDOWN_MAX);
    const scale = COOLDOWN_SCALE[weather] * (unit.rallyBonus > 0 ? SIM.RALLY_COOLDOWN_SCALE : 1);
    return Math.max(1, Math.ceil(base * scale));
  },

  update(state: SimState, ctx: TickContext): void {
    const weather = state.weather;
    if (weather.locked) return;

    weather.ticksRemaining -= 1;
    if (weather.ticksRemaining > 0) return;

    const next = ctx.rng.pick(WEATHER_KINDS) ?? 'clear';
    weather.ticksRemaining = SIM.WEATHER_DURATION;
    if (next === weather.kind) return;

    weather.kind = next;
    ctx.bus.emit('weatherChanged', { tick: ctx.tick, kind: next });
    ctx.logger.log(`Weather turns to ${next}`, 'system');
  },
};

// ─────────────────────────────────────────────
//  Fog System: per-faction visibility
//  Recomputed from scratch every tick.
// ─────────────────────────────────────────────

import type { SimState } from '@/engine/state/SimState';
import { StateQuery } from '@/engine/state/SimState';
import type { Visibility } from '@/engine/state/TickContext';
import { emptyVisibility } from '@/engine/state/TickContext';
import type { Ruleset } from '@/engine/data/types/Ruleset';
import type { UnitState } from '@/engine/data/types/Unit';
import type { WeatherKind } from '@/engine/data/types/Weather';
import type { GridContext } from '@/engine/systems/grid/GridQuery';
import { GridQuery } from '@/engine/systems/grid/GridQuery';
import { posKey, tileKey } from '@/engine/data/types/Map';
import { FACTIONS } from '@/engine/data/types/Faction';
import { SIM } from '@/config';

export const FogSystem = {
  /** Apply weather to a source's base radius */
  effectiveRadius(base: number, weather: WeatherKind): number {
    if (weather !== 'fog') return base;
    return Math.max(SIM.MIN_VISION_RADIUS, base - SIM.FOG_VISION_PENALTY);
  },

  unitRadius(unit: UnitState, ruleset: Ruleset, weather: WeatherKind): number {
    const base = SIM.VISION_RADIUS + ruleset.roles[unit.role].visionBonus;
    return FogSystem.effectiveRadius(base, weather);
  },

  compute(state: SimState, grid: GridContext, ruleset: Ruleset): Visibility {
    const visible = emptyVisibility();
    const weather = state.weather.kind;

    const reveal = (set: Set<string>, x: number, y: number, radius: number) => {
      for (const t of GridQuery.tilesWithin(grid, { x, y }, radius)) set.add(posKey(t));
    };

    for (const unit of StateQuery.liveUnits(state)) {
      reveal(visible[unit.faction], unit.x, unit.y, FogSystem.unitRadius(unit, ruleset, weather));
    }

    for (const faction of FACTIONS) {
      const hq = state.hqs[faction];
      reveal(visible[faction], hq.x, hq.y, FogSystem.effectiveRadius(SIM.VISION_RADIUS, weather));
    }

    for (const b of state.buildings) {
      if (b.kind !== 'watchtower' || !b.owner) continue;
      reveal(visible[b.owner], b.x, b.y, FogSystem.effectiveRadius(SIM.WATCHTOWER_VISION, weather));
    }

    return visible;
  },

  canSee(visibility: Visibility, unit: UnitState, target: { x: number; y: number }): boolean {
    return visibility[unit.faction].has(tileKey(target.x, target.y));
  },
};

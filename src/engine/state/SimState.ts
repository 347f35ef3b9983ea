// ─────────────────────────────────────────────
//  Sim State: snapshot of the whole battle
//  Frozen between ticks; mutated only as an immer draft inside a tick.
// ─────────────────────────────────────────────

import type { UnitState } from '@/engine/data/types/Unit';
import type { GridState, Pos } from '@/engine/data/types/Map';
import type { FactionId, FactionState, HQState, Winner } from '@/engine/data/types/Faction';
import type { BuildingState, TerritoryTile } from '@/engine/data/types/Territory';
import type { WeatherState } from '@/engine/data/types/Weather';
import { SIM } from '@/config';

/** All units keyed by id for O(1) lookup */
export type UnitMap = Record<string, UnitState>;

export interface SimState {
  tick: number;
  grid: GridState;
  hqs: Record<FactionId, HQState>;

  /** All units keyed by id */
  units: UnitMap;
  /** Stable iteration order of unit ids (spawn order) */
  roster: string[];

  factions: Record<FactionId, FactionState>;
  /** [y][x] capture state of every tile */
  territory: TerritoryTile[][];
  buildings: BuildingState[];
  weather: WeatherState;

  winner: Winner | null;
  /** Next numeric suffix for unit ids */
  nextUnitSeq: number;
}

/** Utility helpers for querying SimState */
export const StateQuery = {
  /** Living units in roster order */
  liveUnits(state: SimState): UnitState[] {
    const out: UnitState[] = [];
    for (const id of state.roster) {
      const u = state.units[id];
      if (u && u.hp > 0) out.push(u);
    }
    return out;
  },

  /** A faction's roster, as a filtered view of the global roster */
  factionUnits(state: SimState, faction: FactionId): UnitState[] {
    return StateQuery.liveUnits(state).filter(u => u.faction === faction);
  },

  enemiesOf(state: SimState, faction: FactionId): UnitState[] {
    return StateQuery.liveUnits(state).filter(u => u.faction !== faction);
  },

  /** Footprint tiles of a faction's HQ */
  hqTiles(state: SimState, faction: FactionId): Pos[] {
    const hq = state.hqs[faction];
    return hqFootprint(hq.x, hq.y);
  },

  isHqTile(state: SimState, faction: FactionId, p: Pos): boolean {
    const hq = state.hqs[faction];
    return p.x >= hq.x && p.x < hq.x + SIM.HQ_SIZE && p.y >= hq.y && p.y < hq.y + SIM.HQ_SIZE;
  },

  buildingAt(state: SimState, p: Pos): BuildingState | undefined {
    return state.buildings.find(b => b.x === p.x && b.y === p.y);
  },

  ownedTileCount(state: SimState, faction: FactionId): number {
    let count = 0;
    for (const row of state.territory) {
      for (const tile of row) {
        if (tile.owner === faction) count++;
      }
    }
    return count;
  },
};

export function hqFootprint(x: number, y: number): Pos[] {
  const tiles: Pos[] = [];
  for (let dy = 0; dy < SIM.HQ_SIZE; dy++) {
    for (let dx = 0; dx < SIM.HQ_SIZE; dx++) {
      tiles.push({ x: x + dx, y: y + dy });
    }
  }
  return tiles;
}

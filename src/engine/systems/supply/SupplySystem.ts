// ─────────────────────────────────────────────
//  Supply System
//  A tile is supplied for a faction when it connects back to the HQ
//  through tiles that faction owns or currently stands on.
// ─────────────────────────────────────────────

import type { SimState } from '@/engine/state/SimState';
import { StateQuery } from '@/engine/state/SimState';
import type { TickContext } from '@/engine/state/TickContext';
import type { FactionId } from '@/engine/data/types/Faction';
import { FACTIONS } from '@/engine/data/types/Faction';
import { tileKey } from '@/engine/data/types/Map';
import { BFS } from '@/engine/systems/movement/BFS';
import { LifecycleSystem } from '@/engine/systems/combat/LifecycleSystem';
import { SIM } from '@/config';

export const SupplySystem = {
  /** Supplied tile keys for one faction */
  network(state: SimState, ctx: TickContext, faction: FactionId): Set<string> {
    return BFS.flood(ctx.grid, StateQuery.hqTiles(state, faction), p => {
      if (!ctx.grid.getTerrain(p.x, p.y).walkable) return false;
      if (state.territory[p.y]?.[p.x]?.owner === faction) return true;
      const id = ctx.occupancy.at(p);
      const occupant = id ? state.units[id] : undefined;
      return occupant !== undefined && occupant.hp > 0 && occupant.faction === faction;
    });
  },

  /** Refresh every living unit's `supplied` flag */
  update(state: SimState, ctx: TickContext): void {
    const networks: Record<FactionId, Set<string>> = {
      blue: SupplySystem.network(state, ctx, 'blue'),
      red: SupplySystem.network(state, ctx, 'red'),
    };
    for (const unit of StateQuery.liveUnits(state)) {
      unit.supplied = networks[unit.faction].has(tileKey(unit.x, unit.y));
    }
  },

  /**
   * Periodic attrition for cut-off units. Lethal attrition goes through
   * the regular death path. Returns the ids of units it killed.
   */
  attrition(state: SimState, ctx: TickContext): string[] {
    if (ctx.tick % SIM.SUPPLY_ATTRITION_INTERVAL !== 0) return [];
    const killed: string[] = [];
    for (const faction of FACTIONS) {
      for (const unit of StateQuery.factionUnits(state, faction)) {
        if (unit.supplied) continue;
        unit.hp -= SIM.SUPPLY_ATTRITION_DAMAGE;
        if (unit.hp <= 0 && LifecycleSystem.kill(state, ctx, unit.id, 'attrition')) {
          killed.push(unit.id);
        }
      }
    }
    return killed;
  },
};

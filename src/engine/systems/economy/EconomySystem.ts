// ─────────────────────────────────────────────
//  Economy System: income and spawning
//  Resources trickle in on fixed intervals and are spent on one
//  randomly chosen affordable unit per interval.
// ─────────────────────────────────────────────

import type { SimState } from '@/engine/state/SimState';
import { StateQuery } from '@/engine/state/SimState';
import type { TickContext } from '@/engine/state/TickContext';
import type { FactionId } from '@/engine/data/types/Faction';
import { FACTIONS } from '@/engine/data/types/Faction';
import type { RoleId, UnitState } from '@/engine/data/types/Unit';
import { ROLE_IDS, createUnit } from '@/engine/data/types/Unit';
import type { Pos } from '@/engine/data/types/Map';
import { GridQuery } from '@/engine/systems/grid/GridQuery';
import { unitEvent } from '@/engine/systems/combat/LifecycleSystem';
import { SIM } from '@/config';

export const EconomySystem = {
  /** Economy phase: income, then at most one spawn per faction */
  update(state: SimState, ctx: TickContext): void {
    if (ctx.tick % SIM.ECONOMY_INTERVAL === 0) {
      for (const faction of FACTIONS) {
        state.factions[faction].resources += EconomySystem.periodicIncome(state, faction);
        EconomySystem.trySpawn(state, ctx, faction);
      }
    }

    if (ctx.tick % SIM.TERRITORY_INCOME_INTERVAL === 0) {
      for (const faction of FACTIONS) {
        const income = EconomySystem.territoryIncome(state, faction);
        if (income <= 0) continue;
        state.factions[faction].resources += income;
        ctx.logger.log(`${faction.toUpperCase()} collects ${income} from territory`, 'economy');
      }
    }
  },

  /** Base trickle plus owned depots */
  periodicIncome(state: SimState, faction: FactionId): number {
    const depots = state.buildings.filter(b => b.kind === 'depot' && b.owner === faction).length;
    return 1 + depots * SIM.DEPOT_INCOME;
  },

  territoryIncome(state: SimState, faction: FactionId): number {
    return Math.floor(StateQuery.ownedTileCount(state, faction) / SIM.TERRITORY_INCOME_DIVISOR);
  },

  /** Roles the faction can pay for and has room for */
  affordableRoles(
    state: SimState,
    ctx: TickContext,
    faction: FactionId,
    budget: number = state.factions[faction].resources,
  ): RoleId[] {
    const roster = StateQuery.factionUnits(state, faction);
    return ROLE_IDS.filter(id => {
      const role = ctx.ruleset.roles[id];
      if (role.cost > budget) return false;
      if (role.maxAlive === undefined) return true;
      return roster.filter(u => u.role === id).length < role.maxAlive;
    });
  },

  /** Walkable, free tiles in the box around the faction's HQ anchor */
  spawnTiles(state: SimState, ctx: TickContext, faction: FactionId): Pos[] {
    const hq = state.hqs[faction];
    const tiles: Pos[] = [];
    for (let dy = SIM.SPAWN_OFFSET_MIN; dy <= SIM.SPAWN_OFFSET_MAX; dy++) {
      for (let dx = SIM.SPAWN_OFFSET_MIN; dx <= SIM.SPAWN_OFFSET_MAX; dx++) {
        const p = { x: hq.x + dx, y: hq.y + dy };
        if (GridQuery.walkable(ctx.grid, p) && !ctx.occupancy.isOccupied(p)) tiles.push(p);
      }
    }
    return tiles;
  },

  trySpawn(state: SimState, ctx: TickContext, faction: FactionId): UnitState | null {
    const role = ctx.rng.pick(EconomySystem.affordableRoles(state, ctx, faction));
    if (!role) return null;
    return EconomySystem.spawnUnit(state, ctx, faction, role, false);
  },

  /** Free initial deployment of `count` random roles */
  deployInitial(state: SimState, ctx: TickContext, faction: FactionId, count: number): number {
    let placed = 0;
    for (let i = 0; i < count; i++) {
      const role = ctx.rng.pick(EconomySystem.affordableRoles(state, ctx, faction, Infinity));
      if (!role || !EconomySystem.spawnUnit(state, ctx, faction, role, true)) break;
      placed++;
    }
    return placed;
  },

  /**
   * Place a new unit near the HQ. With no free tile nothing happens and
   * nothing is spent. `free` skips the cost (initial deployment).
   */
  spawnUnit(
    state: SimState,
    ctx: TickContext,
    faction: FactionId,
    roleId: RoleId,
    free: boolean,
  ): UnitState | null {
    const tile = ctx.rng.pick(EconomySystem.spawnTiles(state, ctx, faction));
    if (!tile) return null;

    const role = ctx.ruleset.roles[roleId];
    const pool = state.factions[faction];
    if (!free) pool.resources -= role.cost;

    const id = `${faction}-${state.nextUnitSeq}`;
    state.nextUnitSeq += 1;
    const cooldown = ctx.rng.int(SIM.MOVE_COOLDOWN_MIN, SIM.MOVE_COOLDOWN_MAX);
    const unit = createUnit(id, faction, role, tile.x, tile.y, cooldown, SIM.MORALE_START);

    state.units[id] = unit;
    state.roster.push(id);
    ctx.occupancy.place(id, tile);
    pool.spawned += 1;

    ctx.bus.emit('spawn', unitEvent(unit, ctx.tick));
    ctx.logger.log(`${faction.toUpperCase()} deploys ${role.name} ${id} at (${tile.x}, ${tile.y})`, 'economy');
    return unit;
  },
};

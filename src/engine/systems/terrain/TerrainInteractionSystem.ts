// ─────────────────────────────────────────────
//  Terrain Interaction System
//  Entry side effects and the only terrain mutation: wall placement.
// ─────────────────────────────────────────────

import type { SimState } from '@/engine/state/SimState';
import { StateQuery } from '@/engine/state/SimState';
import type { TickContext } from '@/engine/state/TickContext';
import type { UnitState } from '@/engine/data/types/Unit';
import type { Pos } from '@/engine/data/types/Map';
import { FACTIONS } from '@/engine/data/types/Faction';
import { DIRS, GridQuery } from '@/engine/systems/grid/GridQuery';

export const TerrainInteractionSystem = {
  /** Apply the entered tile's delay (e.g. forest) to the unit */
  onEnter(ctx: TickContext, unit: UnitState, tile: Pos): void {
    const terrain = ctx.grid.getTerrain(tile.x, tile.y);
    if (terrain.entryDelay > 0) unit.idleTicks = terrain.entryDelay;
  },

  /** Whether an engineer may raise a wall on `p` right now */
  canRaiseWall(state: SimState, ctx: TickContext, p: Pos): boolean {
    if (!GridQuery.inBounds(ctx.grid, p)) return false;
    if (!ctx.grid.getTerrain(p.x, p.y).buildable) return false;
    if (ctx.occupancy.isOccupied(p)) return false;
    if (FACTIONS.some(f => StateQuery.isHqTile(state, f, p))) return false;
    return StateQuery.buildingAt(state, p) === undefined;
  },

  /**
   * Turn one random open neighbour of the builder into a wall.
   * Returns the walled tile, or null when every neighbour is unsuitable.
   */
  raiseWall(state: SimState, ctx: TickContext, builder: UnitState): Pos | null {
    for (const [dx, dy] of ctx.rng.shuffle(DIRS)) {
      const tile = { x: builder.x + dx, y: builder.y + dy };
      if (!TerrainInteractionSystem.canRaiseWall(state, ctx, tile)) continue;

      const row = state.grid.terrain[tile.y];
      if (!row) continue;
      row[tile.x] = 'wall';

      ctx.bus.emit('wallPlaced', { tick: ctx.tick, unitId: builder.id, x: tile.x, y: tile.y });
      ctx.logger.log(`${builder.faction.toUpperCase()} engineer ${builder.id} raised a wall at (${tile.x}, ${tile.y})`, 'territory');
      return tile;
    }
    return null;
  },
};

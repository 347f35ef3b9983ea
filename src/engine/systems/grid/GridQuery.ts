// ─────────────────────────────────────────────
//  Grid & Terrain Query
//  Read-only lookups over the terrain grid. Pure functions.
// ─────────────────────────────────────────────

import type { GridState, Pos } from '@/engine/data/types/Map';
import { posKey } from '@/engine/data/types/Map';
import type { TerrainData, TerrainKey } from '@/engine/data/types/Terrain';

export interface GridContext {
  /** Grid dimensions */
  width: number;
  height: number;
  /** Terrain at (x, y); callers check bounds first */
  getTerrain(x: number, y: number): TerrainData;
}

/** Neighbour order is fixed (+x, −x, +y, −y) so searches are reproducible */
export const DIRS: readonly (readonly [number, number])[] = [[1, 0], [-1, 0], [0, 1], [0, -1]];

export function createGridContext(
  grid: GridState,
  terrains: Record<TerrainKey, TerrainData>,
): GridContext {
  return {
    width: grid.width,
    height: grid.height,
    // Reads the live grid so walls raised mid-tick are seen immediately
    getTerrain: (x: number, y: number) => terrains[grid.terrain[y]?.[x] ?? 'wall'],
  };
}

export const GridQuery = {
  inBounds(ctx: GridContext, p: Pos): boolean {
    return p.x >= 0 && p.x < ctx.width && p.y >= 0 && p.y < ctx.height;
  },

  terrainKind(ctx: GridContext, p: Pos): TerrainKey {
    return ctx.getTerrain(p.x, p.y).key;
  },

  walkable(ctx: GridContext, p: Pos): boolean {
    return GridQuery.inBounds(ctx, p) && ctx.getTerrain(p.x, p.y).walkable;
  },

  /** Up to 4 in-bounds orthogonal neighbours */
  neighbors4(ctx: GridContext, p: Pos): Pos[] {
    const out: Pos[] = [];
    for (const [dx, dy] of DIRS) {
      const n = { x: p.x + dx, y: p.y + dy };
      if (GridQuery.inBounds(ctx, n)) out.push(n);
    }
    return out;
  },

  /**
   * All in-bounds tiles within Manhattan distance `radius` of a centre.
   * radius 0 → just the centre.
   */
  tilesWithin(ctx: GridContext, centre: Pos, radius: number): Pos[] {
    const tiles: Pos[] = [];
    for (let dx = -radius; dx <= radius; dx++) {
      const span = radius - Math.abs(dx);
      for (let dy = -span; dy <= span; dy++) {
        const t = { x: centre.x + dx, y: centre.y + dy };
        if (GridQuery.inBounds(ctx, t)) tiles.push(t);
      }
    }
    return tiles;
  },

  /** Whether a walkable path joins `a` and `b` */
  connected(ctx: GridContext, a: Pos, b: Pos): boolean {
    if (!GridQuery.walkable(ctx, a) || !GridQuery.walkable(ctx, b)) return false;
    const goal = posKey(b);
    const seen = new Set<string>([posKey(a)]);
    const queue: Pos[] = [a];
    for (let head = 0; head < queue.length; head++) {
      const cur = queue[head];
      if (!cur) break;
      if (posKey(cur) === goal) return true;
      for (const n of GridQuery.neighbors4(ctx, cur)) {
        const key = posKey(n);
        if (seen.has(key) || !GridQuery.walkable(ctx, n)) continue;
        seen.add(key);
        queue.push(n);
      }
    }
    return false;
  },
};

// ─────────────────────────────────────────────
//  BFS: Next-step pathfinder + flood fill
// ─────────────────────────────────────────────

import type { Pos } from '@/engine/data/types/Map';
import { posKey } from '@/engine/data/types/Map';
import type { GridContext } from '@/engine/systems/grid/GridQuery';
import { GridQuery } from '@/engine/systems/grid/GridQuery';

export const BFS = {
  /**
   * First step of a shortest walkable path from `from` to any tile in `goals`.
   *
   * - `null` when `from` is already a goal (nothing to do).
   * - `from` itself when no goal is reachable (the caller stalls).
   *
   * Tiles in `blockedStart` are refused only as the immediate first step.
   * Interior tiles are not checked for occupancy: occupancy is re-evaluated
   * every tick, so a crowd further along only stalls the unit when it gets there.
   */
  nextStep(
    ctx: GridContext,
    from: Pos,
    goals: ReadonlySet<string>,
    blockedStart: ReadonlySet<string>,
  ): Pos | null {
    const startKey = posKey(from);
    if (goals.has(startKey)) return null;

    const came = new Map<string, Pos | null>([[startKey, null]]);
    const queue: Pos[] = [from];

    for (let head = 0; head < queue.length; head++) {
      const cur = queue[head];
      if (!cur) break;
      const curKey = posKey(cur);

      if (goals.has(curKey)) {
        // Walk back until the tile adjacent to start
        let step = cur;
        let parent = came.get(posKey(step)) ?? null;
        while (parent && posKey(parent) !== startKey) {
          step = parent;
          parent = came.get(posKey(step)) ?? null;
        }
        return step;
      }

      for (const n of GridQuery.neighbors4(ctx, cur)) {
        const key = posKey(n);
        if (came.has(key)) continue;
        if (!ctx.getTerrain(n.x, n.y).walkable) continue;
        if (curKey === startKey && blockedStart.has(key)) continue;
        came.set(key, cur);
        queue.push(n);
      }
    }

    return { x: from.x, y: from.y };
  },

  /**
   * All tiles reachable from `sources` through tiles accepted by `canEnter`.
   * Sources are always included.
   */
  flood(ctx: GridContext, sources: readonly Pos[], canEnter: (p: Pos) => boolean): Set<string> {
    const seen = new Set<string>();
    const queue: Pos[] = [];
    for (const s of sources) {
      const key = posKey(s);
      if (seen.has(key)) continue;
      seen.add(key);
      queue.push(s);
    }

    for (let head = 0; head < queue.length; head++) {
      const cur = queue[head];
      if (!cur) break;
      for (const n of GridQuery.neighbors4(ctx, cur)) {
        const key = posKey(n);
        if (seen.has(key) || !canEnter(n)) continue;
        seen.add(key);
        queue.push(n);
      }
    }

    return seen;
  },
};

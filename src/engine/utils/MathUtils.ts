import type { Pos } from '@/engine/data/types/Map';

export const MathUtils = {
  /** Manhattan distance */
  dist(a: Pos, b: Pos): number {
    return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
  },

  /** Smallest Manhattan distance from `p` to any tile in `tiles` */
  distToAny(p: Pos, tiles: readonly Pos[]): number {
    let best = Infinity;
    for (const t of tiles) {
      const d = MathUtils.dist(p, t);
      if (d < best) best = d;
    }
    return best;
  },

  /** Clamp a value between min and max */
  clamp(v: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, v));
  },

  samePos(a: Pos, b: Pos): boolean {
    return a.x === b.x && a.y === b.y;
  },
};

// ─────────────────────────────────────────────
//  Occupancy Index
//  Sparse tile → unit id lookup, rebuilt once per tick and kept
//  current as units move or die within the tick.
// ─────────────────────────────────────────────

import type { Pos } from '@/engine/data/types/Map';
import { tileKey } from '@/engine/data/types/Map';
import type { UnitState } from '@/engine/data/types/Unit';

export class OccupancyIndex {
  private readonly byTile = new Map<string, string>();

  static build(units: Iterable<UnitState>): OccupancyIndex {
    const index = new OccupancyIndex();
    for (const u of units) {
      if (u.hp <= 0) continue;
      // First unit found keeps the tile
      if (!index.byTile.has(tileKey(u.x, u.y))) index.byTile.set(tileKey(u.x, u.y), u.id);
    }
    return index;
  }

  at(p: Pos): string | undefined {
    return this.byTile.get(tileKey(p.x, p.y));
  }

  isOccupied(p: Pos): boolean {
    return this.byTile.has(tileKey(p.x, p.y));
  }

  move(unitId: string, from: Pos, to: Pos): void {
    if (this.at(from) === unitId) this.byTile.delete(tileKey(from.x, from.y));
    this.byTile.set(tileKey(to.x, to.y), unitId);
  }

  place(unitId: string, p: Pos): void {
    this.byTile.set(tileKey(p.x, p.y), unitId);
  }

  remove(unitId: string, p: Pos): void {
    if (this.at(p) === unitId) this.byTile.delete(tileKey(p.x, p.y));
  }

  /** Occupied tile keys, optionally excluding one unit's own tile */
  occupiedKeys(exceptUnitId?: string): Set<string> {
    const keys = new Set<string>();
    for (const [key, id] of this.byTile) {
      if (id !== exceptUnitId) keys.add(key);
    }
    return keys;
  }
}

// ─────────────────────────────────────────────
//  Map / Grid Types
// ─────────────────────────────────────────────

import type { TerrainKey } from './Terrain';
import type { FactionId } from './Faction';
import type { BuildingKind } from './Territory';

export interface Pos {
  x: number;
  y: number;
}

/** Stable string key for a tile, used by sets and lookup maps */
export function tileKey(x: number, y: number): string {
  return `${x},${y}`;
}

export function posKey(p: Pos): string {
  return tileKey(p.x, p.y);
}

/** Mutable terrain grid. Only wall placement writes to it. */
export interface GridState {
  width: number;
  height: number;
  /**
   * 2D grid [y][x] of TerrainKey strings.
   * Row 0 = top row.
   */
  terrain: TerrainKey[][];
}

export interface BuildingPlacement {
  id: string;
  kind: BuildingKind;
  x: number;
  y: number;
}

/** Battle map supplied by the terrain provider */
export interface BattleMapData {
  id: string;
  name: string;
  grid: GridState;
  /** Top-left anchor of each faction's HQ footprint */
  hqAnchors: Record<FactionId, Pos>;
  buildings: BuildingPlacement[];
}

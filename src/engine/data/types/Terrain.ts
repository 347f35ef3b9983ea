// ─────────────────────────────────────────────
//  Terrain Types
// ─────────────────────────────────────────────

export const TERRAIN_KEYS = ['open', 'forest', 'wall', 'water'] as const;

export type TerrainKey = (typeof TERRAIN_KEYS)[number];

export interface TerrainData {
  key: TerrainKey;
  name: string;
  /** ASCII glyph used by map files */
  glyph: string;
  /** Whether any unit can stand here */
  walkable: boolean;
  /** Idle ticks imposed on a unit that enters this tile */
  entryDelay: number;
  /** Engineers may raise a wall on this terrain */
  buildable: boolean;
}

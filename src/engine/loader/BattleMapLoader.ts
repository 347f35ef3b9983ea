// ─────────────────────────────────────────────
//  BattleMapLoader
//  Turns ASCII rows (one glyph per tile) into a BattleMapData and
//  checks what the simulation assumes about a map: rectangular, known
//  terrain, HQs on open ground and reachable from each other.
// ─────────────────────────────────────────────

import { z } from 'zod';
import type { BattleMapData, BuildingPlacement, GridState, Pos } from '@/engine/data/types/Map';
import { posKey } from '@/engine/data/types/Map';
import type { FactionId } from '@/engine/data/types/Faction';
import { FACTIONS } from '@/engine/data/types/Faction';
import type { TerrainData, TerrainKey } from '@/engine/data/types/Terrain';
import { TERRAIN_KEYS } from '@/engine/data/types/Terrain';
import { createGridContext, GridQuery } from '@/engine/systems/grid/GridQuery';
import { hqFootprint } from '@/engine/state/SimState';
import { ConfigError } from './ConfigError';

import skirmishJson from '@/assets/data/maps/skirmish.json';

const posSchema = z.object({ x: z.number().int(), y: z.number().int() });

const mapFileSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  rows: z.array(z.string()).min(1),
  hqAnchors: z.object({ blue: posSchema, red: posSchema }),
  buildings: z
    .array(
      z.object({
        id: z.string().min(1),
        kind: z.enum(['watchtower', 'depot']),
        x: z.number().int(),
        y: z.number().int(),
      }),
    )
    .default([]),
});

export interface MapMeta {
  id: string;
  name: string;
}

function glyphTable(terrains: Record<TerrainKey, TerrainData>): Map<string, TerrainKey> {
  const table = new Map<string, TerrainKey>();
  for (const key of TERRAIN_KEYS) table.set(terrains[key].glyph, key);
  return table;
}

function parseRows(rows: string[], terrains: Record<TerrainKey, TerrainData>, issues: string[]): GridState {
  const glyphs = glyphTable(terrains);
  const width = rows[0]?.length ?? 0;
  const terrain: TerrainKey[][] = rows.map((row, y) => {
    if (row.length !== width) issues.push(`row ${y} has ${row.length} tiles, expected ${width}`);
    return [...row].map((glyph, x) => {
      const key = glyphs.get(glyph);
      if (!key) {
        issues.push(`unknown terrain glyph "${glyph}" at (${x}, ${y})`);
        return 'wall';
      }
      return key;
    });
  });
  return { width, height: rows.length, terrain };
}

function validate(
  grid: GridState,
  terrains: Record<TerrainKey, TerrainData>,
  hqAnchors: Record<FactionId, Pos>,
  buildings: BuildingPlacement[],
  issues: string[],
): void {
  const ctx = createGridContext(grid, terrains);
  const hqTiles = new Set<string>();

  for (const faction of FACTIONS) {
    const anchor = hqAnchors[faction];
    for (const t of hqFootprint(anchor.x, anchor.y)) {
      hqTiles.add(posKey(t));
      if (!GridQuery.inBounds(ctx, t)) {
        issues.push(`${faction} HQ tile (${t.x}, ${t.y}) is out of bounds`);
      } else if (!GridQuery.walkable(ctx, t)) {
        issues.push(`${faction} HQ tile (${t.x}, ${t.y}) is not walkable`);
      }
    }
  }

  if (
    GridQuery.walkable(ctx, hqAnchors.blue) &&
    GridQuery.walkable(ctx, hqAnchors.red) &&
    !GridQuery.connected(ctx, hqAnchors.blue, hqAnchors.red)
  ) {
    issues.push('no walkable path joins the two HQs');
  }

  const ids = new Set<string>();
  for (const b of buildings) {
    if (ids.has(b.id)) issues.push(`duplicate building id "${b.id}"`);
    ids.add(b.id);
    if (!GridQuery.walkable(ctx, b)) {
      issues.push(`building ${b.id} at (${b.x}, ${b.y}) is not on walkable ground`);
    } else if (hqTiles.has(posKey(b))) {
      issues.push(`building ${b.id} at (${b.x}, ${b.y}) overlaps an HQ`);
    }
  }
}

export const BattleMapLoader = {
  /**
   * Build a map from glyph rows. Throws ConfigError listing every
   * problem found.
   */
  fromRows(
    rows: string[],
    terrains: Record<TerrainKey, TerrainData>,
    hqAnchors: Record<FactionId, Pos>,
    buildings: BuildingPlacement[] = [],
    meta: MapMeta = { id: 'custom', name: 'Custom' },
  ): BattleMapData {
    const issues: string[] = [];
    if (rows.length === 0) throw new ConfigError(`map "${meta.id}"`, ['map has no rows']);

    const grid = parseRows(rows, terrains, issues);
    // Placement checks only make sense on a rectangular grid
    if (issues.length === 0) validate(grid, terrains, hqAnchors, buildings, issues);
    if (issues.length > 0) throw new ConfigError(`map "${meta.id}"`, issues);

    return {
      id: meta.id,
      name: meta.name,
      grid,
      hqAnchors: { blue: { ...hqAnchors.blue }, red: { ...hqAnchors.red } },
      buildings: buildings.map(b => ({ ...b })),
    };
  },

  /** Parse a map file (already JSON-decoded) */
  parse(raw: unknown, terrains: Record<TerrainKey, TerrainData>): BattleMapData {
    const result = mapFileSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(
        'map file',
        result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`),
      );
    }
    const file = result.data;
    return BattleMapLoader.fromRows(file.rows, terrains, file.hqAnchors, file.buildings, {
      id: file.id,
      name: file.name,
    });
  },

  /** The bundled skirmish map */
  loadDefault(terrains: Record<TerrainKey, TerrainData>): BattleMapData {
    return BattleMapLoader.parse(skirmishJson, terrains);
  },
};

// ─────────────────────────────────────────────
//  Ruleset
//  Role + terrain tables, read-only for a session.
// ─────────────────────────────────────────────

import type { RoleData, RoleId } from './Unit';
import type { TerrainData, TerrainKey } from './Terrain';

export interface Ruleset {
  roles: Record<RoleId, RoleData>;
  terrains: Record<TerrainKey, TerrainData>;
}

// ─────────────────────────────────────────────
//  Territory System: tile + building capture automaton
//  Owners change only through a completed capture or a completed vacate.
// ─────────────────────────────────────────────

import type { SimState } from '@/engine/state/SimState';
import type { TickContext } from '@/engine/state/TickContext';
import type { FactionId } from '@/engine/data/types/Faction';
import type {
  BuildingState,
  CaptureCell,
  CaptureThresholds,
  TerritoryTile,
} from '@/engine/data/types/Territory';
import { SIM } from '@/config';

export const TILE_THRESHOLDS: CaptureThresholds = {
  capture: SIM.CAPTURE_TICKS,
  vacate: SIM.VACATE_TICKS,
};

export const BUILDING_THRESHOLDS: CaptureThresholds = {
  capture: SIM.BUILDING_CAPTURE_TICKS,
  vacate: null,
};

export type CaptureOutcome = 'captured' | 'lost' | null;

// --- Automaton ---

/**
 * Advance one cell by one tick.
 * `occupant` is the faction of the unit standing on the cell, if any.
 */
export function stepCapture(
  cell: CaptureCell,
  occupant: FactionId | null,
  thresholds: CaptureThresholds,
): CaptureOutcome {
  if (occupant) {
    cell.vacate = 0;
    if (cell.captureFaction === occupant) {
      cell.progress += 1;
    } else {
      cell.captureFaction = occupant;
      cell.progress = 1;
    }
    if (cell.progress >= thresholds.capture && cell.owner !== occupant) {
      cell.owner = occupant;
      return 'captured';
    }
    return null;
  }

  cell.progress = 0;
  cell.captureFaction = null;

  if (cell.owner !== null && thresholds.vacate !== null) {
    cell.vacate += 1;
    if (cell.vacate >= thresholds.vacate) {
      cell.owner = null;
      cell.vacate = 0;
      return 'lost';
    }
  }
  return null;
}

// --- Initial state ---

export function createTerritory(width: number, height: number): TerritoryTile[][] {
  return Array.from({ length: height }, () =>
    Array.from({ length: width }, (): TerritoryTile => ({
      owner: null,
      captureFaction: null,
      progress: 0,
      vacate: 0,
      hq: null,
    })),
  );
}

// --- Tick phase ---

function occupantFaction(state: SimState, ctx: TickContext, x: number, y: number): FactionId | null {
  const id = ctx.occupancy.at({ x, y });
  if (!id) return null;
  const unit = state.units[id];
  return unit && unit.hp > 0 ? unit.faction : null;
}

/** Update every non-HQ tile. */
export function updateTerritory(state: SimState, ctx: TickContext): void {
  for (let y = 0; y < state.territory.length; y++) {
    const row = state.territory[y];
    if (!row) continue;
    for (let x = 0; x < row.length; x++) {
      const tile = row[x];
      if (!tile || tile.hq) continue;

      const previous = tile.owner;
      const outcome = stepCapture(tile, occupantFaction(state, ctx, x, y), TILE_THRESHOLDS);
      if (outcome === 'captured' && tile.owner) {
        ctx.bus.emit('tileCaptured', { tick: ctx.tick, x, y, faction: tile.owner });
      } else if (outcome === 'lost' && previous) {
        ctx.bus.emit('tileLost', { tick: ctx.tick, x, y, faction: previous });
      }
    }
  }
}

/** Buildings share the automaton but keep their own state and never decay. */
export function updateBuildings(state: SimState, ctx: TickContext): void {
  for (const building of state.buildings) {
    const previous = building.owner;
    const outcome = stepCapture(
      building,
      occupantFaction(state, ctx, building.x, building.y),
      BUILDING_THRESHOLDS,
    );
    if (outcome === 'captured' && building.owner) {
      announceBuilding(ctx, building, previous);
    }
  }
}

function announceBuilding(ctx: TickContext, building: BuildingState, previous: FactionId | null): void {
  if (!building.owner) return;
  ctx.bus.emit('buildingCaptured', {
    tick: ctx.tick,
    buildingId: building.id,
    kind: building.kind,
    faction: building.owner,
    previous,
  });
  ctx.logger.log(`${building.owner.toUpperCase()} captured ${building.kind} ${building.id}`, 'territory');
}

// ─────────────────────────────────────────────
//  Territory / Building Types
// ─────────────────────────────────────────────

import type { FactionId } from './Faction';

/** Shared capture bookkeeping for territory tiles and buildings */
export interface CaptureCell {
  owner: FactionId | null;
  /** Faction currently accumulating progress, if any */
  captureFaction: FactionId | null;
  progress: number;
  /** Ticks since the owner last stood here */
  vacate: number;
}

export interface TerritoryTile extends CaptureCell {
  /** Set on HQ footprint tiles, which never change hands */
  hq: FactionId | null;
}

export type BuildingKind = 'watchtower' | 'depot';

export interface BuildingState extends CaptureCell {
  id: string;
  kind: BuildingKind;
  x: number;
  y: number;
}

export interface CaptureThresholds {
  capture: number;
  /** null disables decay */
  vacate: number | null;
}

// ─────────────────────────────────────────────
//  Faction Types
// ─────────────────────────────────────────────

export const FACTIONS = ['blue', 'red'] as const;

export type FactionId = (typeof FACTIONS)[number];

/** Outcome of a finished battle */
export type Winner = FactionId | 'draw';

export function opponentOf(faction: FactionId): FactionId {
  return faction === 'blue' ? 'red' : 'blue';
}

/** Faction-wide counters. Passed into every phase instead of living in globals. */
export interface FactionState {
  id: FactionId;
  resources: number;
  /** Enemy units this faction has destroyed */
  kills: number;
  /** Own units lost to combat or attrition */
  losses: number;
  /** Units ever spawned, initial garrison included */
  spawned: number;
}

export interface HQState {
  faction: FactionId;
  /** Top-left corner of the footprint */
  x: number;
  y: number;
  hp: number;
  maxHp: number;
}

// ─────────────────────────────────────────────
//  Faction System: initialization and elimination
// ─────────────────────────────────────────────

import type { SimState } from '@/engine/state/SimState';
import { StateQuery } from '@/engine/state/SimState';
import type { FactionId, FactionState, HQState } from '@/engine/data/types/Faction';
import type { Pos } from '@/engine/data/types/Map';
import { SIM } from '@/config';

export const FactionSystem = {
  createFactions(resources: number = SIM.START_RESOURCES): Record<FactionId, FactionState> {
    const make = (id: FactionId): FactionState => ({ id, resources, kills: 0, losses: 0, spawned: 0 });
    return { blue: make('blue'), red: make('red') };
  },

  createHqs(anchors: Record<FactionId, Pos>): Record<FactionId, HQState> {
    const make = (faction: FactionId): HQState => ({
      faction,
      x: anchors[faction].x,
      y: anchors[faction].y,
      hp: SIM.HQ_MAX_HP,
      maxHp: SIM.HQ_MAX_HP,
    });
    return { blue: make('blue'), red: make('red') };
  },

  /** No live units left on the field */
  isEliminated(state: SimState, faction: FactionId): boolean {
    return StateQuery.factionUnits(state, faction).length === 0;
  },
};

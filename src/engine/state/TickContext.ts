// ─────────────────────────────────────────────
//  Tick Context: per-tick collaborators handed to every phase.
//  Lives outside the immer snapshot; rebuilt at the start of each tick.
// ─────────────────────────────────────────────

import type { SimState } from './SimState';
import { StateQuery } from './SimState';
import type { Ruleset } from '@/engine/data/types/Ruleset';
import type { FactionId } from '@/engine/data/types/Faction';
import type { GridContext } from '@/engine/systems/grid/GridQuery';
import { createGridContext } from '@/engine/systems/grid/GridQuery';
import { OccupancyIndex } from '@/engine/utils/OccupancyIndex';
import type { SimRng } from '@/engine/utils/SimRng';
import type { SimEventBus } from '@/engine/utils/EventBus';
import type { Logger } from '@/engine/utils/Logger';

/** Per-faction set of visible tile keys */
export type Visibility = Record<FactionId, Set<string>>;

export interface TickContext {
  tick: number;
  rng: SimRng;
  ruleset: Ruleset;
  grid: GridContext;
  occupancy: OccupancyIndex;
  visibility: Visibility;
  /** Units killed this tick, awaiting the removal sweep */
  pendingRemovals: Set<string>;
  bus: SimEventBus;
  logger: Logger;
}

export interface TickDeps {
  rng: SimRng;
  ruleset: Ruleset;
  bus: SimEventBus;
  logger: Logger;
}

export function emptyVisibility(): Visibility {
  return { blue: new Set(), red: new Set() };
}

/** Build a context over `state` (usually an immer draft) for the given tick */
export function createTickContext(state: SimState, tick: number, deps: TickDeps): TickContext {
  return {
    tick,
    rng: deps.rng,
    ruleset: deps.ruleset,
    grid: createGridContext(state.grid, deps.ruleset.terrains),
    occupancy: OccupancyIndex.build(StateQuery.liveUnits(state)),
    visibility: emptyVisibility(),
    pendingRemovals: new Set(),
    bus: deps.bus,
    logger: deps.logger,
  };
}

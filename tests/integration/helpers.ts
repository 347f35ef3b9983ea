// ─────────────────────────────────────────────
//  Integration Test Helpers
//  Build headless battle scenarios by hand: a map from glyph rows,
//  units placed exactly where a test wants them, and a TickContext for
//  calling single systems directly.
// ─────────────────────────────────────────────

import type { SimState } from '@/engine/state/SimState';
import type { TickContext } from '@/engine/state/TickContext';
import { createTickContext } from '@/engine/state/TickContext';
import { Simulation, buildInitialState } from '@/engine/state/Simulation';
import type { FactionId } from '@/engine/data/types/Faction';
import type { Pos, BuildingPlacement } from '@/engine/data/types/Map';
import type { RoleId, UnitState } from '@/engine/data/types/Unit';
import { createUnit } from '@/engine/data/types/Unit';
import type { WeatherKind } from '@/engine/data/types/Weather';
import type { Ruleset } from '@/engine/data/types/Ruleset';
import { loadRuleset } from '@/engine/loader/RulesetLoader';
import { BattleMapLoader } from '@/engine/loader/BattleMapLoader';
import { FogSystem } from '@/engine/systems/vision/FogSystem';
import type { SimEventBus, SimEventMap } from '@/engine/utils/EventBus';
import { createEventBus } from '@/engine/utils/EventBus';
import { createLogger } from '@/engine/utils/Logger';
import { SimRng } from '@/engine/utils/SimRng';
import { SIM } from '@/config';

export const RULESET: Ruleset = loadRuleset();

/** `w`×`h` rows of open ground */
export function openRows(w = 12, h = 8): string[] {
  return Array.from({ length: h }, () => '.'.repeat(w));
}

export interface StateOptions {
  rows?: string[];
  blueHq?: Pos;
  redHq?: Pos;
  buildings?: BuildingPlacement[];
  weather?: WeatherKind;
  resources?: number;
}

/**
 * Empty battle (no units). Defaults: 12×8 open field, blue HQ at (0, 3),
 * red HQ at (10, 3), locked clear weather, START_RESOURCES each.
 */
export function makeState(opts: StateOptions = {}): SimState {
  const map = BattleMapLoader.fromRows(
    opts.rows ?? openRows(),
    RULESET.terrains,
    { blue: opts.blueHq ?? { x: 0, y: 3 }, red: opts.redHq ?? { x: 10, y: 3 } },
    opts.buildings ?? [],
  );
  return buildInitialState(map, {
    weather: opts.weather ?? 'clear',
    weatherLocked: true,
    startResources: opts.resources,
  });
}

/**
 * Place a unit directly. Parked by default (long move cooldown) so it
 * stays put unless the test clears `moveCooldown`.
 */
export function addUnit(
  state: SimState,
  faction: FactionId,
  role: RoleId,
  x: number,
  y: number,
  overrides: Partial<Omit<UnitState, 'id' | 'faction' | 'role'>> = {},
): UnitState {
  const id = `${faction}-${state.nextUnitSeq}`;
  state.nextUnitSeq += 1;
  const unit: UnitState = {
    ...createUnit(id, faction, RULESET.roles[role], x, y, 99, SIM.MORALE_START),
    ...overrides,
  };
  state.units[id] = unit;
  state.roster.push(id);
  return unit;
}

/** TickContext over a plain state, visibility included */
export function makeCtx(state: SimState, tick = 1, seed: number | string = 'test'): TickContext {
  const bus = createEventBus();
  const ctx = createTickContext(state, tick, {
    rng: new SimRng(seed),
    ruleset: RULESET,
    bus,
    logger: createLogger(bus, { echo: false }),
  });
  ctx.visibility = FogSystem.compute(state, ctx.grid, RULESET);
  return ctx;
}

export function makeSim(state: SimState, seed: number | string = 'test'): Simulation {
  return new Simulation(state, { ruleset: RULESET, seed });
}

/** Collect every payload of one event kind */
export function record<K extends keyof SimEventMap>(bus: SimEventBus, event: K): SimEventMap[K][] {
  const seen: SimEventMap[K][] = [];
  bus.on(event, payload => seen.push(payload));
  return seen;
}

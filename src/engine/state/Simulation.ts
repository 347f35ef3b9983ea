// ─────────────────────────────────────────────
//  Simulation: single source of truth
//  Holds the SimState snapshot and advances it one tick at a time.
//  A tick is one immer produce: phases mutate the draft in a fixed
//  order and outsiders only ever see whole ticks.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import { produce } from 'immer';
import type { SimState } from './SimState';
import { hqFootprint } from './SimState';
import type { TickContext, TickDeps, Visibility } from './TickContext';
import { createTickContext, emptyVisibility } from './TickContext';
import type { BattleMapData } from '@/engine/data/types/Map';
import type { Ruleset } from '@/engine/data/types/Ruleset';
import type { Winner } from '@/engine/data/types/Faction';
import { FACTIONS } from '@/engine/data/types/Faction';
import type { WeatherKind } from '@/engine/data/types/Weather';
import type { BuildingState } from '@/engine/data/types/Territory';
import { createGridContext } from '@/engine/systems/grid/GridQuery';
import { createTerritory, updateBuildings, updateTerritory } from '@/engine/systems/territory/TerritorySystem';
import { EconomySystem } from '@/engine/systems/economy/EconomySystem';
import { FactionSystem } from '@/engine/systems/faction/FactionSystem';
import { FogSystem } from '@/engine/systems/vision/FogSystem';
import { UnitUpdateSystem } from '@/engine/systems/update/UnitUpdateSystem';
import { LifecycleSystem } from '@/engine/systems/combat/LifecycleSystem';
import { SupplySystem } from '@/engine/systems/supply/SupplySystem';
import { MoraleSystem } from '@/engine/systems/morale/MoraleSystem';
import { WeatherSystem } from '@/engine/systems/weather/WeatherSystem';
import { VictorySystem } from '@/engine/systems/stage/VictorySystem';
import type { SimEventBus } from '@/engine/utils/EventBus';
import { createEventBus } from '@/engine/utils/EventBus';
import type { Logger } from '@/engine/utils/Logger';
import { createLogger } from '@/engine/utils/Logger';
import { SimRng } from '@/engine/utils/SimRng';
import { SIM } from '@/config';

type StoreListener = (state: SimState) => void;

export interface SimulationOptions {
  ruleset: Ruleset;
  seed: number | string;
  /** Echo log lines to the console */
  echoLog?: boolean;
}

export interface CreateSimulationOptions extends SimulationOptions {
  map: BattleMapData;
  /** Starting weather; `weatherLocked` keeps it for the whole battle */
  weather?: WeatherKind;
  weatherLocked?: boolean;
  /** Free units per faction at setup */
  initialUnits?: number;
  startResources?: number;
}

/** Initial snapshot for a map, before any unit is deployed */
export function buildInitialState(
  map: BattleMapData,
  options: { weather?: WeatherKind; weatherLocked?: boolean; startResources?: number } = {},
): SimState {
  const { width, height } = map.grid;
  const territory = createTerritory(width, height);

  for (const faction of FACTIONS) {
    const anchor = map.hqAnchors[faction];
    for (const t of hqFootprint(anchor.x, anchor.y)) {
      const tile = territory[t.y]?.[t.x];
      if (!tile) continue;
      tile.hq = faction;
      tile.owner = faction;
    }
  }

  const buildings: BuildingState[] = map.buildings.map(b => ({
    ...b,
    owner: null,
    captureFaction: null,
    progress: 0,
    vacate: 0,
  }));

  return {
    tick: 0,
    grid: { width, height, terrain: map.grid.terrain.map(row => [...row]) },
    hqs: FactionSystem.createHqs(map.hqAnchors),
    units: {},
    roster: [],
    factions: FactionSystem.createFactions(options.startResources),
    territory,
    buildings,
    weather: WeatherSystem.initial(options.weather, options.weatherLocked),
    winner: null,
    nextUnitSeq: 1,
  };
}

export class Simulation {
  /** Per-simulation event bus; nothing is shared between simulations */
  readonly events: SimEventBus = createEventBus();
  readonly logger: Logger;
  readonly ruleset: Ruleset;

  private state: SimState;
  private visibility: Visibility;
  private readonly rng: SimRng;
  private listeners: StoreListener[] = [];

  /** Build a fresh battle on a map, with the initial free deployment */
  static create(options: CreateSimulationOptions): Simulation {
    const sim = new Simulation(buildInitialState(options.map, options), options);
    sim.deploy(options.initialUnits ?? SIM.INITIAL_UNITS);
    return sim;
  }

  /** Adopt a prebuilt state */
  constructor(state: SimState, options: SimulationOptions) {
    this.state = state;
    this.ruleset = options.ruleset;
    this.rng = new SimRng(options.seed);
    this.logger = createLogger(this.events, { echo: options.echoLog ?? false });
    this.visibility = FogSystem.compute(state, createGridContext(state.grid, this.ruleset.terrains), this.ruleset);
  }

  getState(): SimState { return this.state; }

  /** Visibility computed during the last tick */
  getVisibility(): Visibility { return this.visibility; }

  isGameOver(): Winner | null { return this.state.winner; }

  /** Advance one tick. Does nothing once the battle is decided. */
  advanceTick(): void {
    if (this.state.winner) return;

    let visibility: Visibility = emptyVisibility();
    this.state = produce(this.state, (draft: Draft<SimState>) => {
      draft.tick += 1;
      const ctx = this.context(draft, draft.tick);

      EconomySystem.update(draft, ctx);

      ctx.visibility = FogSystem.compute(draft, ctx.grid, ctx.ruleset);
      visibility = ctx.visibility;

      UnitUpdateSystem.update(draft, ctx);
      LifecycleSystem.sweep(draft, ctx.pendingRemovals);

      updateTerritory(draft, ctx);
      updateBuildings(draft, ctx);

      SupplySystem.update(draft, ctx);
      MoraleSystem.update(draft, ctx);
      LifecycleSystem.sweep(draft, SupplySystem.attrition(draft, ctx));

      WeatherSystem.update(draft, ctx);
      VictorySystem.update(draft, ctx);
    });
    this.visibility = visibility;

    this.events.emit('tickCompleted', { tick: this.state.tick });
    this.notify();
  }

  /**
   * Remove a unit outright (no kill credit). Goes through the same death
   * path as combat. Returns false when the unit is already gone.
   */
  removeUnit(id: string): boolean {
    let removed = false;
    this.state = produce(this.state, (draft: Draft<SimState>) => {
      const ctx = this.context(draft, draft.tick);
      removed = LifecycleSystem.kill(draft, ctx, id, 'removed');
      LifecycleSystem.sweep(draft, ctx.pendingRemovals);
    });
    if (removed) this.notify();
    return removed;
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  private deploy(count: number): void {
    this.state = produce(this.state, (draft: Draft<SimState>) => {
      const ctx = this.context(draft, draft.tick);
      for (const faction of FACTIONS) EconomySystem.deployInitial(draft, ctx, faction, count);
    });
    this.visibility = FogSystem.compute(
      this.state,
      createGridContext(this.state.grid, this.ruleset.terrains),
      this.ruleset,
    );
  }

  private context(state: SimState, tick: number): TickContext {
    const deps: TickDeps = { rng: this.rng, ruleset: this.ruleset, bus: this.events, logger: this.logger };
    return createTickContext(state, tick, deps);
  }

  private notify(): void {
    for (const listener of this.listeners) listener(this.state);
  }
}

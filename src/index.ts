export { SIM } from './config';
export type { SimConstants } from './config';

export type { Pos, GridState, BattleMapData, BuildingPlacement } from './engine/data/types/Map';
export { tileKey, posKey } from './engine/data/types/Map';
export type { FactionId, Winner, FactionState, HQState } from './engine/data/types/Faction';
export { FACTIONS, opponentOf } from './engine/data/types/Faction';
export type { RoleId, RoleData, AbilitySpec, AbilityKind, UnitState } from './engine/data/types/Unit';
export { ROLE_IDS } from './engine/data/types/Unit';
export type { TerrainKey, TerrainData } from './engine/data/types/Terrain';
export type { BuildingKind, BuildingState, TerritoryTile } from './engine/data/types/Territory';
export type { WeatherKind, WeatherState } from './engine/data/types/Weather';
export type { Ruleset } from './engine/data/types/Ruleset';

export { ConfigError } from './engine/loader/ConfigError';
export { loadRuleset, parseRuleset } from './engine/loader/RulesetLoader';
export { BattleMapLoader } from './engine/loader/BattleMapLoader';

export type { SimState } from './engine/state/SimState';
export { StateQuery } from './engine/state/SimState';
export type { Visibility } from './engine/state/TickContext';
export { Simulation, buildInitialState } from './engine/state/Simulation';
export type { SimulationOptions, CreateSimulationOptions } from './engine/state/Simulation';
export { SimulationDriver } from './engine/coordinator/SimulationDriver';
export type { DriverOptions, DriverResult } from './engine/coordinator/SimulationDriver';

export type { SimEventMap, SimEventBus } from './engine/utils/EventBus';
export type { Logger, LogClass } from './engine/utils/Logger';

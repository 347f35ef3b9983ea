// ─────────────────────────────────────────────
//  Simulation constants
//  All durations are in ticks.
// ─────────────────────────────────────────────

export const SIM = {
  // Headquarters
  HQ_MAX_HP: 500,
  HQ_SIZE: 2,

  // Economy
  START_RESOURCES: 10,
  INITIAL_UNITS: 3,
  ECONOMY_INTERVAL: 10,
  TERRITORY_INCOME_INTERVAL: 50,
  TERRITORY_INCOME_DIVISOR: 10,
  DEPOT_INCOME: 2,
  /** Spawn box around the HQ anchor: anchor + [MIN, MAX] on both axes */
  SPAWN_OFFSET_MIN: -2,
  SPAWN_OFFSET_MAX: 3,

  // Cadence
  MOVE_COOLDOWN_MIN: 5,
  MOVE_COOLDOWN_MAX: 10,
  ATTACK_COOLDOWN: 5,
  SIEGE_THRESHOLD: 3,

  // Vision
  VISION_RADIUS: 5,
  FOG_VISION_PENALTY: 2,
  MIN_VISION_RADIUS: 2,
  WATCHTOWER_VISION: 4,

  // Behaviour policy
  ENGAGE_RADIUS: 5,
  DEFEND_RADIUS: 4,
  SAFETY_THRESHOLD: 3,
  REGROUP_DISTANCE: 4,
  OFFENSE_THRESHOLD: 5,
  HOLD_RADIUS: 2,

  // Territory
  CAPTURE_TICKS: 30,
  VACATE_TICKS: 100,
  BUILDING_CAPTURE_TICKS: 50,

  // Morale
  MORALE_START: 70,
  MORALE_MAX: 100,
  MORALE_ALLY_WEIGHT: 1,
  MORALE_ENEMY_WEIGHT: 2,
  MORALE_RETREAT: 20,
  MORALE_WAVER: 40,
  MORALE_WAVER_SKIP_CHANCE: 0.5,
  DEATH_SHOCK: 10,
  COMMANDER_DEATH_SHOCK: 25,

  // Supply
  SUPPLY_ATTRITION_INTERVAL: 10,
  SUPPLY_ATTRITION_DAMAGE: 1,

  // Veterans
  ELITE_KILL_THRESHOLD: 3,
  ELITE_HP_BONUS: 50,
  ELITE_DAMAGE_BONUS: 5,

  // Weather
  WEATHER_DURATION: 100,
  RAIN_COOLDOWN_SCALE: 1.5,
  STORM_COOLDOWN_SCALE: 2,
  STORM_ATTACK_PENALTY: 2,
  RALLY_COOLDOWN_SCALE: 0.75,
} as const;

export type SimConstants = typeof SIM;

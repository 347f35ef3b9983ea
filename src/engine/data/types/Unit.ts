// ─────────────────────────────────────────────
//  Unit Types
// ─────────────────────────────────────────────

import type { FactionId } from './Faction';

export const ROLE_IDS = [
  'infantry',
  'tank',
  'scout',
  'shieldbearer',
  'medic',
  'engineer',
  'repairbot',
  'spotter',
  'commander',
] as const;

export type RoleId = (typeof ROLE_IDS)[number];

/** Parameters of each ability kind, keyed by kind */
export interface AbilityParams {
  none: {};
  heal: { period: number; radius: number; amount: number };
  shield: { period: number; radius: number; reduction: number };
  rally: { period: number; radius: number; bonus: number };
  repair: { period: number; radius: number; amount: number };
  wall: { period: number };
}

export type AbilityKind = keyof AbilityParams;

/**
 * Data-described role ability. The update loop dispatches on `kind`
 * through a single handler table (see AbilitySystem).
 */
export type AbilitySpec<K extends AbilityKind = AbilityKind> = {
  [P in K]: { kind: P } & AbilityParams[P];
}[K];

/** Static role template loaded from JSON. Never mutated. */
export interface RoleData {
  id: RoleId;
  name: string;
  hp: number;
  damage: number;
  /** Path steps per movement turn */
  speed: number;
  cost: number;
  /** Added to the base vision radius */
  visionBonus: number;
  /** Cap on simultaneously alive units of this role per faction */
  maxAlive?: number;
  ability: AbilitySpec;
}

/** Runtime unit: state that changes tick to tick */
export interface UnitState {
  readonly id: string;
  readonly faction: FactionId;
  readonly role: RoleId;

  // Position
  x: number;
  y: number;

  hp: number;
  maxHp: number;
  damage: number;
  speed: number;

  // Cadence
  moveCooldown: number;
  attackCooldown: number;
  /** Extra idle ticks from slow terrain */
  idleTicks: number;

  morale: number;
  supplied: boolean;
  /** Consecutive ticks spent on the enemy HQ */
  siegeCounter: number;
  /** Ticks until the role ability fires again */
  abilityTimer: number;

  // Auras: cleared every tick, re-applied by nearby support units
  damageReduction: number;
  rallyBonus: number;

  kills: number;
  elite: boolean;
}

export function abilityPeriod(ability: AbilitySpec): number {
  return ability.kind === 'none' ? 0 : ability.period;
}

/** Creates a UnitState from RoleData at a spawn position */
export function createUnit(
  id: string,
  faction: FactionId,
  role: RoleData,
  x: number,
  y: number,
  moveCooldown: number,
  morale: number,
): UnitState {
  return {
    id,
    faction,
    role: role.id,
    x,
    y,
    hp: role.hp,
    maxHp: role.hp,
    damage: role.damage,
    speed: role.speed,
    moveCooldown,
    attackCooldown: 0,
    idleTicks: 0,
    morale,
    supplied: true,
    siegeCounter: 0,
    abilityTimer: abilityPeriod(role.ability),
    damageReduction: 0,
    rallyBonus: 0,
    kills: 0,
    elite: false,
  };
}

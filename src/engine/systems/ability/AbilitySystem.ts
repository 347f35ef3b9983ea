// ─────────────────────────────────────────────
//  Ability System
//  Role abilities are data (kind + period + effect) looked up in one
//  handler table. Auras (shield, rally) last a single tick: they are
//  wiped at the start of the unit phase and re-applied by whoever is
//  still standing close enough.
// ─────────────────────────────────────────────

import type { SimState } from '@/engine/state/SimState';
import { StateQuery } from '@/engine/state/SimState';
import type { TickContext } from '@/engine/state/TickContext';
import type { AbilityKind, AbilitySpec, UnitState } from '@/engine/data/types/Unit';
import { TerrainInteractionSystem } from '@/engine/systems/terrain/TerrainInteractionSystem';
import { MathUtils } from '@/engine/utils/MathUtils';

type AbilityHandler<K extends AbilityKind> = (
  state: SimState,
  ctx: TickContext,
  unit: UnitState,
  spec: AbilitySpec<K>,
) => void;

type AbilityTable = { [K in AbilityKind]: AbilityHandler<K> };

function alliesWithin(state: SimState, unit: UnitState, radius: number, includeSelf: boolean): UnitState[] {
  return StateQuery.factionUnits(state, unit.faction).filter(
    ally => (includeSelf || ally.id !== unit.id) && MathUtils.dist(ally, unit) <= radius,
  );
}

const HANDLERS: AbilityTable = {
  none: () => undefined,

  heal: (state, _ctx, unit, spec) => {
    for (const ally of alliesWithin(state, unit, spec.radius, true)) {
      if (ally.hp < ally.maxHp) ally.hp = Math.min(ally.maxHp, ally.hp + spec.amount);
    }
  },

  shield: (state, _ctx, unit, spec) => {
    for (const ally of alliesWithin(state, unit, spec.radius, false)) {
      ally.damageReduction = Math.max(ally.damageReduction, spec.reduction);
    }
  },

  rally: (state, _ctx, unit, spec) => {
    for (const ally of alliesWithin(state, unit, spec.radius, false)) {
      ally.rallyBonus = Math.max(ally.rallyBonus, spec.bonus);
    }
  },

  repair: (state, ctx, unit, spec) => {
    const hq = state.hqs[unit.faction];
    if (hq.hp <= 0 || hq.hp >= hq.maxHp) return;
    if (MathUtils.distToAny(unit, StateQuery.hqTiles(state, unit.faction)) > spec.radius) return;
    hq.hp = Math.min(hq.maxHp, hq.hp + spec.amount);
    ctx.logger.log(`${unit.faction.toUpperCase()} repairbot ${unit.id} repairs HQ to ${hq.hp}`, 'economy');
  },

  wall: (state, ctx, unit) => {
    TerrainInteractionSystem.raiseWall(state, ctx, unit);
  },
};

function invoke<K extends AbilityKind>(
  state: SimState,
  ctx: TickContext,
  unit: UnitState,
  spec: AbilitySpec<K>,
): void {
  const handler: AbilityHandler<K> = HANDLERS[spec.kind];
  handler(state, ctx, unit, spec);
}

export const AbilitySystem = {
  /** Clear last tick's auras on every unit */
  resetAuras(state: SimState): void {
    for (const unit of Object.values(state.units)) {
      unit.damageReduction = 0;
      unit.rallyBonus = 0;
    }
  },

  /**
   * Tick the unit's ability timer and fire the ability when it runs out.
   * Returns true when the ability fired.
   */
  run(state: SimState, ctx: TickContext, unit: UnitState): boolean {
    if (unit.hp <= 0) return false;
    const spec = ctx.ruleset.roles[unit.role].ability;
    if (spec.kind === 'none') return false;

    unit.abilityTimer -= 1;
    if (unit.abilityTimer > 0) return false;
    unit.abilityTimer = spec.period;

    invoke(state, ctx, unit, spec);
    return true;
  },
};

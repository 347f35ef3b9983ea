// ─────────────────────────────────────────────
//  Morale System
//  Local ally/enemy density drives morale; deaths shock nearby allies.
// ─────────────────────────────────────────────

import type { SimState } from '@/engine/state/SimState';
import { StateQuery } from '@/engine/state/SimState';
import type { TickContext } from '@/engine/state/TickContext';
import type { UnitState } from '@/engine/data/types/Unit';
import { GridQuery } from '@/engine/systems/grid/GridQuery';
import { MathUtils } from '@/engine/utils/MathUtils';
import { SIM } from '@/config';

export type MoraleState = 'steady' | 'wavering' | 'routed';

export const MoraleSystem = {
  clamp(value: number): number {
    return MathUtils.clamp(value, 0, SIM.MORALE_MAX);
  },

  /** Per-tick morale change for a unit with the given neighbourhood */
  delta(allies: number, enemies: number, supplied: boolean): number {
    const raw = SIM.MORALE_ALLY_WEIGHT * allies - SIM.MORALE_ENEMY_WEIGHT * enemies;
    // Cut-off units can only hold or lose morale
    return supplied ? raw : Math.min(raw, 0);
  },

  classify(unit: Pick<UnitState, 'morale'>): MoraleState {
    if (unit.morale < SIM.MORALE_RETREAT) return 'routed';
    if (unit.morale < SIM.MORALE_WAVER) return 'wavering';
    return 'steady';
  },

  /** Count living allies and enemies on the 4 orthogonal neighbours */
  neighbourhood(state: SimState, ctx: TickContext, unit: UnitState): { allies: number; enemies: number } {
    let allies = 0;
    let enemies = 0;
    for (const n of GridQuery.neighbors4(ctx.grid, unit)) {
      const id = ctx.occupancy.at(n);
      const other = id ? state.units[id] : undefined;
      if (!other || other.hp <= 0) continue;
      if (other.faction === unit.faction) allies++;
      else enemies++;
    }
    return { allies, enemies };
  },

  /** Morale phase. Supply must already be resolved for this tick. */
  update(state: SimState, ctx: TickContext): void {
    for (const unit of StateQuery.liveUnits(state)) {
      const { allies, enemies } = MoraleSystem.neighbourhood(state, ctx, unit);
      unit.morale = MoraleSystem.clamp(unit.morale + MoraleSystem.delta(allies, enemies, unit.supplied));
    }
  },

  /**
   * Shock applied the moment a unit dies.
   * A fallen commander shakes the whole faction; anyone else only the
   * allies standing right next to them.
   */
  applyDeathShock(state: SimState, victim: UnitState): void {
    for (const ally of StateQuery.factionUnits(state, victim.faction)) {
      if (ally.id === victim.id) continue;
      if (victim.role === 'commander') {
        ally.morale = MoraleSystem.clamp(ally.morale - SIM.COMMANDER_DEATH_SHOCK);
      } else if (MathUtils.dist(ally, victim) === 1) {
        ally.morale = MoraleSystem.clamp(ally.morale - SIM.DEATH_SHOCK);
      }
    }
  },
};

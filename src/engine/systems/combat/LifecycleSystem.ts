// ─────────────────────────────────────────────
//  Lifecycle System: death marking + removal sweep
//  Deaths are marked the instant they happen and swept from the
//  roster once the phase is over (mark-then-sweep).
// ─────────────────────────────────────────────

import type { SimState } from '@/engine/state/SimState';
import type { TickContext } from '@/engine/state/TickContext';
import type { UnitState } from '@/engine/data/types/Unit';
import type { DeathCause, UnitEventBase } from '@/engine/utils/EventBus';
import { MoraleSystem } from '@/engine/systems/morale/MoraleSystem';
import { ProgressionSystem } from '@/engine/systems/progression/ProgressionSystem';

export function unitEvent(unit: UnitState, tick: number): UnitEventBase {
  return { tick, unitId: unit.id, faction: unit.faction, role: unit.role, x: unit.x, y: unit.y };
}

export const LifecycleSystem = {
  /**
   * Mark a unit dead: hide it from the occupancy index, credit the kill,
   * shock its neighbours and announce the death. Safe to call twice:
   * only the first call for a unit does anything.
   */
  kill(
    state: SimState,
    ctx: TickContext,
    victimId: string,
    cause: DeathCause,
    killerId: string | null = null,
  ): boolean {
    const victim = state.units[victimId];
    if (!victim || ctx.pendingRemovals.has(victimId)) return false;

    ctx.pendingRemovals.add(victimId);
    victim.hp = 0;
    ctx.occupancy.remove(victimId, victim);

    state.factions[victim.faction].losses += 1;
    const killer = killerId ? state.units[killerId] : undefined;
    if (killer && killer.faction !== victim.faction) {
      state.factions[killer.faction].kills += 1;
      ProgressionSystem.recordKill(killer, ctx);
    }

    MoraleSystem.applyDeathShock(state, victim);

    ctx.bus.emit('death', { ...unitEvent(victim, ctx.tick), cause, killerId: killer ? killer.id : null });
    ctx.logger.log(
      `${victim.faction.toUpperCase()} ${victim.role} ${victim.id} destroyed (${cause})`,
      'combat',
    );
    return true;
  },

  /**
   * Delete units from the roster. Ids that are already gone are skipped,
   * so sweeping the same id twice leaves the roster unchanged.
   */
  sweep(state: SimState, ids: Iterable<string>): number {
    const doomed = new Set<string>();
    for (const id of ids) {
      if (state.units[id]) doomed.add(id);
    }
    if (doomed.size === 0) return 0;

    for (const id of doomed) delete state.units[id];
    state.roster = state.roster.filter(id => !doomed.has(id));
    return doomed.size;
  },
};

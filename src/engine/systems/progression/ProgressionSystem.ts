// ─────────────────────────────────────────────
//  ProgressionSystem
//  Kill tally and veteran promotion.
// ─────────────────────────────────────────────

import type { UnitState } from '@/engine/data/types/Unit';
import type { TickContext } from '@/engine/state/TickContext';
import { SIM } from '@/config';

export const ProgressionSystem = {
  /**
   * Credit a kill to `unit`. Promotes it to elite once its tally reaches
   * the threshold. Returns true when this kill caused the promotion.
   */
  recordKill(unit: UnitState, ctx: TickContext): boolean {
    unit.kills += 1;
    if (unit.elite || unit.kills < SIM.ELITE_KILL_THRESHOLD) return false;

    unit.elite = true;
    unit.maxHp += SIM.ELITE_HP_BONUS;
    unit.hp += SIM.ELITE_HP_BONUS;
    unit.damage += SIM.ELITE_DAMAGE_BONUS;

    ctx.bus.emit('unitPromoted', { tick: ctx.tick, unitId: unit.id, faction: unit.faction });
    ctx.logger.log(`${unit.faction.toUpperCase()} ${unit.role} ${unit.id} is now a veteran`, 'combat');
    return true;
  },
};

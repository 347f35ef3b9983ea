// ─────────────────────────────────────────────
//  Combat System: adjacency combat + HQ siege
// ─────────────────────────────────────────────

import type { SimState } from '@/engine/state/SimState';
import { StateQuery } from '@/engine/state/SimState';
import type { TickContext } from '@/engine/state/TickContext';
import type { UnitState } from '@/engine/data/types/Unit';
import type { Pos } from '@/engine/data/types/Map';
import { opponentOf } from '@/engine/data/types/Faction';
import { DIRS } from '@/engine/systems/grid/GridQuery';
import { DamageCalc } from './DamageCalc';
import { LifecycleSystem, unitEvent } from './LifecycleSystem';
import { SIM } from '@/config';

export const CombatSystem = {
  /**
   * First enemy within Manhattan distance 1, scanning the unit's own tile
   * and then +x, −x, +y, −y.
   */
  findAdjacentEnemy(state: SimState, ctx: TickContext, unit: UnitState): UnitState | undefined {
    const around: Pos[] = [{ x: unit.x, y: unit.y }, ...DIRS.map(([dx, dy]) => ({ x: unit.x + dx, y: unit.y + dy }))];
    for (const p of around) {
      const id = ctx.occupancy.at(p);
      if (!id || id === unit.id) continue;
      const other = state.units[id];
      if (other && other.hp > 0 && other.faction !== unit.faction) return other;
    }
    return undefined;
  },

  /**
   * Attack the first adjacent enemy if the attack cooldown allows.
   * Returns true when a hit landed.
   */
  attack(state: SimState, ctx: TickContext, unit: UnitState): boolean {
    if (unit.hp <= 0 || unit.attackCooldown > 0) return false;

    const target = CombatSystem.findAdjacentEnemy(state, ctx, unit);
    if (!target) return false;

    const damage = DamageCalc.hit(unit, target);
    target.hp -= damage;
    unit.attackCooldown = DamageCalc.attackCooldown(state.weather.kind);

    ctx.bus.emit('attack', { ...unitEvent(unit, ctx.tick), targetId: target.id, damage });

    if (target.hp <= 0) {
      LifecycleSystem.kill(state, ctx, target.id, 'combat', unit.id);
    }
    return true;
  },

  /**
   * Siege accounting, once per unit per tick. Standing on the enemy HQ
   * builds up the counter; every SIEGE_THRESHOLD ticks the HQ takes the
   * unit's base damage. Leaving the footprint resets the counter.
   * An `engaged` unit already hit a unit this tick: the counter holds.
   */
  siege(state: SimState, ctx: TickContext, unit: UnitState, engaged = false): boolean {
    if (unit.hp <= 0) return false;
    const enemy = opponentOf(unit.faction);

    if (!StateQuery.isHqTile(state, enemy, unit)) {
      unit.siegeCounter = 0;
      return false;
    }
    if (engaged) return false;

    unit.siegeCounter += 1;
    if (unit.siegeCounter < SIM.SIEGE_THRESHOLD) return false;

    const hq = state.hqs[enemy];
    hq.hp = Math.max(0, hq.hp - unit.damage);
    unit.siegeCounter = 0;

    ctx.bus.emit('attack_hq', { ...unitEvent(unit, ctx.tick), target: enemy, damage: unit.damage, hqHp: hq.hp });
    ctx.logger.log(
      `${unit.faction.toUpperCase()} ${unit.role} ${unit.id} hit ${enemy.toUpperCase()} HQ for ${unit.damage} (${hq.hp}/${hq.maxHp})`,
      'combat',
    );
    return true;
  },
};

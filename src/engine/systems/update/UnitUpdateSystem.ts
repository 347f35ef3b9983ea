// ─────────────────────────────────────────────
//  Unit Update System
//  Per tick, per living unit in roster order:
//    cooldowns → movement (or waiting) → combat → siege (if no hit) → ability
// ─────────────────────────────────────────────

import type { SimState } from '@/engine/state/SimState';
import type { TickContext } from '@/engine/state/TickContext';
import type { UnitState } from '@/engine/data/types/Unit';
import type { Pos } from '@/engine/data/types/Map';
import { UnitAI } from '@/engine/systems/ai/UnitAI';
import { BFS } from '@/engine/systems/movement/BFS';
import { CombatSystem } from '@/engine/systems/combat/CombatSystem';
import { unitEvent } from '@/engine/systems/combat/LifecycleSystem';
import { AbilitySystem } from '@/engine/systems/ability/AbilitySystem';
import { MoraleSystem } from '@/engine/systems/morale/MoraleSystem';
import { TerrainInteractionSystem } from '@/engine/systems/terrain/TerrainInteractionSystem';
import { WeatherSystem } from '@/engine/systems/weather/WeatherSystem';
import { MathUtils } from '@/engine/utils/MathUtils';
import { SIM } from '@/config';

export const UnitUpdateSystem = {
  /** Unit phase over the whole roster */
  update(state: SimState, ctx: TickContext): void {
    AbilitySystem.resetAuras(state);
    // Snapshot the order: units spawned mid-phase wait for the next tick
    for (const id of [...state.roster]) {
      const unit = state.units[id];
      if (!unit || unit.hp <= 0 || ctx.pendingRemovals.has(id)) continue;
      UnitUpdateSystem.updateUnit(state, ctx, unit);
    }
  },

  updateUnit(state: SimState, ctx: TickContext, unit: UnitState): void {
    if (unit.attackCooldown > 0) unit.attackCooldown -= 1;

    if (unit.moveCooldown > 0) {
      unit.moveCooldown -= 1;
    } else if (unit.idleTicks > 0) {
      unit.idleTicks -= 1;
    } else {
      UnitUpdateSystem.move(state, ctx, unit);
    }

    // A waiting unit still fights back; a landed hit is its action for the tick
    const hit = CombatSystem.attack(state, ctx, unit);
    CombatSystem.siege(state, ctx, unit, hit);
    AbilitySystem.run(state, ctx, unit);
  },

  /**
   * One movement turn. Returns the number of steps taken; the move
   * cooldown is only reset when the unit actually went somewhere.
   */
  move(state: SimState, ctx: TickContext, unit: UnitState): number {
    let steps = 0;
    const morale = MoraleSystem.classify(unit);

    if (morale === 'routed') {
      const back = UnitAI.retreatStep(state, ctx, unit);
      if (back) {
        UnitUpdateSystem.step(ctx, unit, back);
        steps = 1;
      }
    } else if (morale === 'wavering' && ctx.rng.chance(SIM.MORALE_WAVER_SKIP_CHANCE)) {
      return 0;
    } else {
      const goals = UnitAI.goalTiles(state, ctx, unit, UnitAI.chooseGoal(state, ctx, unit));
      for (let i = 0; i < unit.speed; i++) {
        const next = BFS.nextStep(ctx.grid, unit, goals, ctx.occupancy.occupiedKeys(unit.id));
        if (!next || MathUtils.samePos(next, unit)) break;
        UnitUpdateSystem.step(ctx, unit, next);
        steps++;
        // Slow ground ends the movement turn
        if (unit.idleTicks > 0) break;
      }
    }

    if (steps > 0) {
      unit.moveCooldown = WeatherSystem.moveCooldown(ctx.rng, state.weather.kind, unit);
    }
    return steps;
  },

  /** Move one tile, keeping the occupancy index in sync */
  step(ctx: TickContext, unit: UnitState, to: Pos): void {
    const from = { x: unit.x, y: unit.y };
    ctx.occupancy.move(unit.id, from, to);
    unit.x = to.x;
    unit.y = to.y;
    ctx.bus.emit('move', { ...unitEvent(unit, ctx.tick), from });
    TerrainInteractionSystem.onEnter(ctx, unit, to);
  },
};

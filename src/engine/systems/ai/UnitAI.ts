// ─────────────────────────────────────────────
//  Unit AI: fixed-priority goal selection
//  Every unit re-decides every movement turn; nothing is remembered
//  between ticks.
// ─────────────────────────────────────────────

import type { SimState } from '@/engine/state/SimState';
import { StateQuery } from '@/engine/state/SimState';
import type { TickContext } from '@/engine/state/TickContext';
import type { UnitState } from '@/engine/data/types/Unit';
import type { Pos } from '@/engine/data/types/Map';
import { posKey } from '@/engine/data/types/Map';
import { opponentOf } from '@/engine/data/types/Faction';
import { DIRS, GridQuery } from '@/engine/systems/grid/GridQuery';
import { FogSystem } from '@/engine/systems/vision/FogSystem';
import { MathUtils } from '@/engine/utils/MathUtils';
import { SIM } from '@/config';

export type UnitGoal =
  | { kind: 'engage'; target: UnitState }
  | { kind: 'defend'; target: UnitState }
  | { kind: 'regroup'; ally: UnitState }
  | { kind: 'advance' }
  | { kind: 'hold' };

/** Nearest candidate by `metric`; ties go to the earlier candidate */
function nearest(candidates: UnitState[], metric: (u: UnitState) => number): { unit: UnitState; d: number } | null {
  let best: { unit: UnitState; d: number } | null = null;
  for (const c of candidates) {
    const d = metric(c);
    if (!best || d < best.d) best = { unit: c, d };
  }
  return best;
}

/** A unit's tile plus its in-bounds neighbours */
function ringAround(ctx: TickContext, p: Pos): Set<string> {
  const tiles = new Set<string>([posKey(p)]);
  for (const n of GridQuery.neighbors4(ctx.grid, p)) tiles.add(posKey(n));
  return tiles;
}

export const UnitAI = {
  chooseGoal(state: SimState, ctx: TickContext, unit: UnitState): UnitGoal {
    const visibleEnemies = StateQuery.enemiesOf(state, unit.faction)
      .filter(e => FogSystem.canSee(ctx.visibility, unit, e));

    // ── 1. Engage ──
    const closest = nearest(visibleEnemies, e => MathUtils.dist(unit, e));
    if (closest && closest.d <= SIM.ENGAGE_RADIUS) {
      return { kind: 'engage', target: closest.unit };
    }

    // ── 2. Defend the HQ ──
    const homeTiles = StateQuery.hqTiles(state, unit.faction);
    const intruder = nearest(visibleEnemies, e => MathUtils.distToAny(e, homeTiles));
    if (intruder && intruder.d <= SIM.DEFEND_RADIUS) {
      return { kind: 'defend', target: intruder.unit };
    }

    const roster = StateQuery.factionUnits(state, unit.faction);

    // ── 3. Regroup ──
    if (roster.length < SIM.SAFETY_THRESHOLD) {
      const buddy = nearest(roster.filter(a => a.id !== unit.id), a => MathUtils.dist(unit, a));
      if (buddy && buddy.d > SIM.REGROUP_DISTANCE) {
        return { kind: 'regroup', ally: buddy.unit };
      }
    }

    // ── 4. Advance ──
    if (roster.length >= SIM.OFFENSE_THRESHOLD) return { kind: 'advance' };

    // ── 5. Hold ──
    return { kind: 'hold' };
  },

  /** Tile keys that satisfy a goal */
  goalTiles(state: SimState, ctx: TickContext, unit: UnitState, goal: UnitGoal): Set<string> {
    switch (goal.kind) {
      case 'engage':
      case 'defend':
        return ringAround(ctx, goal.target);
      case 'regroup':
        return ringAround(ctx, goal.ally);
      case 'advance':
        return new Set(StateQuery.hqTiles(state, opponentOf(unit.faction)).map(posKey));
      case 'hold': {
        const tiles = new Set<string>();
        for (const hq of StateQuery.hqTiles(state, unit.faction)) {
          for (const t of GridQuery.tilesWithin(ctx.grid, hq, SIM.HOLD_RADIUS)) tiles.add(posKey(t));
        }
        return tiles;
      }
    }
  },

  /**
   * Retreat: the first free walkable neighbour (+x, −x, +y, −y) that is
   * strictly farther from the enemy HQ. null when there is none.
   */
  retreatStep(state: SimState, ctx: TickContext, unit: UnitState): Pos | null {
    const enemyHq = StateQuery.hqTiles(state, opponentOf(unit.faction));
    const current = MathUtils.distToAny(unit, enemyHq);
    for (const [dx, dy] of DIRS) {
      const n = { x: unit.x + dx, y: unit.y + dy };
      if (!GridQuery.walkable(ctx.grid, n) || ctx.occupancy.isOccupied(n)) continue;
      if (MathUtils.distToAny(n, enemyHq) > current) return n;
    }
    return null;
  },
};

// ─────────────────────────────────────────────
//  VictorySystem
//  Last phase of every tick. HQ destruction is checked before
//  elimination (no live units left); a simultaneous loss on both
//  sides is a draw.
// ─────────────────────────────────────────────

import type { SimState } from '@/engine/state/SimState';
import type { TickContext } from '@/engine/state/TickContext';
import type { FactionId, Winner } from '@/engine/data/types/Faction';
import { FactionSystem } from '@/engine/systems/faction/FactionSystem';

function decide(blueLost: boolean, redLost: boolean): Winner | null {
  if (blueLost && redLost) return 'draw';
  if (blueLost) return 'red';
  if (redLost) return 'blue';
  return null;
}

export const VictorySystem = {
  evaluate(state: SimState): Winner | null {
    const hqDown = (f: FactionId) => state.hqs[f].hp <= 0;
    const byHq = decide(hqDown('blue'), hqDown('red'));
    if (byHq) return byHq;

    const out = (f: FactionId) => FactionSystem.isEliminated(state, f);
    return decide(out('blue'), out('red'));
  },

  /** Record the winner once; later calls leave it untouched */
  update(state: SimState, ctx: TickContext): Winner | null {
    if (state.winner) return state.winner;

    const winner = VictorySystem.evaluate(state);
    if (!winner) return null;

    state.winner = winner;
    ctx.bus.emit('gameOver', { tick: ctx.tick, winner });
    ctx.logger.log(
      winner === 'draw' ? `Battle ends in a draw at tick ${ctx.tick}` : `${winner.toUpperCase()} wins at tick ${ctx.tick}`,
      'system',
    );
    return winner;
  },
};

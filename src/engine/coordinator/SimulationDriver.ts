// ─────────────────────────────────────────────
//  Simulation Driver
//  Calls advanceTick() until the battle is decided, the tick budget
//  runs out or the caller aborts. Pacing is the caller's business: the
//  driver only yields to the event loop every `yieldEvery` ticks.
// ─────────────────────────────────────────────

import { setImmediate as yieldToLoop } from 'node:timers/promises';
import type { Simulation } from '@/engine/state/Simulation';
import type { SimState } from '@/engine/state/SimState';
import type { Winner } from '@/engine/data/types/Faction';

export interface DriverOptions {
  maxTicks: number;
  signal?: AbortSignal;
  /** Called after every tick with the new snapshot */
  onTick?: (state: SimState) => void;
  yieldEvery?: number;
}

export type StopReason = 'victory' | 'maxTicks' | 'aborted';

export interface DriverResult {
  winner: Winner | null;
  ticks: number;
  reason: StopReason;
}

export const SimulationDriver = {
  async run(sim: Simulation, options: DriverOptions): Promise<DriverResult> {
    const yieldEvery = Math.max(1, options.yieldEvery ?? 50);
    let ticks = 0;

    while (ticks < options.maxTicks) {
      if (sim.isGameOver()) break;
      if (options.signal?.aborted) {
        return { winner: sim.isGameOver(), ticks, reason: 'aborted' };
      }

      sim.advanceTick();
      ticks++;
      options.onTick?.(sim.getState());

      if (ticks % yieldEvery === 0) await yieldToLoop();
    }

    const winner = sim.isGameOver();
    return { winner, ticks, reason: winner ? 'victory' : 'maxTicks' };
  },
};

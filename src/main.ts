// ─────────────────────────────────────────────
//  Entry point: headless battle
//
//  SIM_SEED       RNG seed (default: "frontline")
//  SIM_MAX_TICKS  tick budget (default: 5000)
//  SIM_QUIET=1    only print the result
// ─────────────────────────────────────────────

import { loadRuleset } from '@/engine/loader/RulesetLoader';
import { BattleMapLoader } from '@/engine/loader/BattleMapLoader';
import { ConfigError } from '@/engine/loader/ConfigError';
import { Simulation } from '@/engine/state/Simulation';
import { SimulationDriver } from '@/engine/coordinator/SimulationDriver';

const seed = process.env['SIM_SEED'] ?? 'frontline';
const maxTicks = Number.parseInt(process.env['SIM_MAX_TICKS'] ?? '5000', 10);
const quiet = process.env['SIM_QUIET'] === '1';

async function main(): Promise<void> {
  const ruleset = loadRuleset();
  const map = BattleMapLoader.loadDefault(ruleset.terrains);
  const sim = Simulation.create({ ruleset, map, seed, echoLog: !quiet });

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const result = await SimulationDriver.run(sim, {
    maxTicks: Number.isFinite(maxTicks) && maxTicks > 0 ? maxTicks : 5000,
    signal: controller.signal,
  });

  const state = sim.getState();
  const outcome = result.winner ? `winner: ${result.winner}` : `no winner (${result.reason})`;
  console.log(`${map.name}: ${outcome} after ${result.ticks} ticks`);
  console.log(
    `HQ blue ${state.hqs.blue.hp}/${state.hqs.blue.maxHp}, red ${state.hqs.red.hp}/${state.hqs.red.maxHp}; ` +
    `kills blue ${state.factions.blue.kills}, red ${state.factions.red.kills}`,
  );
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error(err);
  }
  process.exitCode = 1;
});

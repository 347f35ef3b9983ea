// ─────────────────────────────────────────────
//  Damage Calculation
//  Pure functions over unit stats.
// ─────────────────────────────────────────────

import type { UnitState } from '@/engine/data/types/Unit';
import type { WeatherKind } from '@/engine/data/types/Weather';
import { SIM } from '@/config';

export const DamageCalc = {
  /**
   * Damage of one adjacency hit.
   * The attacker's rally aura amplifies, the target's shield aura reduces.
   */
  hit(
    attacker: Pick<UnitState, 'damage' | 'rallyBonus'>,
    target: Pick<UnitState, 'damageReduction'>,
  ): number {
    const raw = attacker.damage * (1 + attacker.rallyBonus) * (1 - target.damageReduction);
    return Math.max(0, Math.floor(raw));
  },

  /** Cooldown set on the attacker after a hit */
  attackCooldown(weather: WeatherKind): number {
    return SIM.ATTACK_COOLDOWN + (weather === 'storm' ? SIM.STORM_ATTACK_PENALTY : 0);
  },
};

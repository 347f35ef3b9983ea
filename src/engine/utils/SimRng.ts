// ─────────────────────────────────────────────
//  SimRng: the one source of randomness in a battle
//  Mulberry32 over a uint32 state. A battle seeded with the same
//  number or label replays tick for tick.
// ─────────────────────────────────────────────

const GOLDEN = 0x6d2b79f5;
const UINT32_RANGE = 0x1_0000_0000;

/** FNV-1a over the UTF-16 code units of a seed label */
export function hashSeed(label: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < label.length; i++) {
    h = Math.imul(h ^ label.charCodeAt(i), 0x01000193);
  }
  return h >>> 0;
}

type Seed = number | string;

export class SimRng {
  private state: number;

  constructor(seed: Seed) {
    const s = typeof seed === 'string' ? hashSeed(seed) : seed >>> 0;
    // An all-zero state would start the stream on a fixed point
    this.state = s === 0 ? GOLDEN : s;
  }

  /** Uniform in [0, 1) */
  next(): number {
    this.state = (this.state + GOLDEN) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / UINT32_RANGE;
  }

  /** Integer in [lo, hi]; a reversed range collapses to `lo` */
  int(lo: number, hi: number): number {
    const min = Math.trunc(lo);
    const max = Math.trunc(hi);
    return max < min ? min : min + Math.floor(this.next() * (max - min + 1));
  }

  /** True with probability `p` */
  chance(p: number): boolean {
    return this.next() < p;
  }

  pick<T>(items: readonly T[]): T | undefined {
    return items.length === 0 ? undefined : items[this.int(0, items.length - 1)];
  }

  /** Fisher-Yates over a copy */
  shuffle<T>(items: readonly T[]): T[] {
    const out = [...items];
    for (let i = out.length - 1; i > 0; i--) {
      const j = this.int(0, i);
      [out[i], out[j]] = [out[j], out[i]];
    }
    return out;
  }
}

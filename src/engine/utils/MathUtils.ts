import type { Pos } from '@/engine/data/types/Grid';

export const MathUtils = {
  /** Manhattan distance */
  dist(a: Pos, b: Pos): number {
    return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
  },

  /** Orthogonal neighbours share an edge */
  isAdjacent(a: Pos, b: Pos): boolean {
    return MathUtils.dist(a, b) === 1;
  },
};

// ─────────────────────────────────────────────
//  Seeded Random Number Generator
//  Level generation must replay exactly for a given seed.
// ─────────────────────────────────────────────

export class SeededRNG {
  private seed: number;

  constructor(seed: number) {
    this.seed = Number.isFinite(seed) ? Math.abs(Math.floor(seed)) % 4294967296 : 1;
    // Consecutive seeds give near-identical first draws; skip one
    this.next();
  }

  /** Float in [0, 1) */
  next(): number {
    // Simple LCG (Linear Congruential Generator)
    this.seed = (this.seed * 1664525 + 1013904223) % 4294967296;
    return this.seed / 4294967296;
  }

  /** Integer in [min, max] inclusive */
  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Uniform pick; undefined for an empty list */
  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[this.nextInt(0, items.length - 1)];
  }

  /** Fisher-Yates shuffle into a new array */
  shuffle<T>(items: readonly T[]): T[] {
    const out = [...items];
    for (let i = out.length - 1; i > 0; i--) {
      const j = this.nextInt(0, i);
      const a = out[i];
      const b = out[j];
      if (a === undefined || b === undefined) continue;
      out[i] = b;
      out[j] = a;
    }
    return out;
  }
}

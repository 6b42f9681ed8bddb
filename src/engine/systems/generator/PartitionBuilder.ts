// ─────────────────────────────────────────────
//  Partition Builder
//  Equal-size, connected partitions for the level generator:
//  a serpentine walk cut into K runs, then random boundary swaps
//  that keep every district size and every district valid.
// ─────────────────────────────────────────────

import type { Partition } from '@/engine/data/types/Grid';
import type { DistrictRules } from '@/engine/data/types/Level';
import type { Grid } from '@/engine/grid/Grid';
import type { SeededRNG } from '@/engine/utils/MathUtils';
import { checkDistrict } from '@/engine/systems/region/RegionValidator';

/** Eight walk orientations: bit 0 = column-major, bit 1 = mirror x, bit 2 = mirror y. */
export const ORIENTATIONS = 8;

/**
 * Boustrophedon order over the grid. Consecutive cells in the
 * result always share an edge, so any run of it is connected.
 */
export function serpentineOrder(width: number, height: number, orientation: number): number[] {
  const columnMajor = (orientation & 1) !== 0;
  const mirrorX = (orientation & 2) !== 0;
  const mirrorY = (orientation & 4) !== 0;
  const major = columnMajor ? width : height;
  const minor = columnMajor ? height : width;

  const order: number[] = [];
  for (let a = 0; a < major; a++) {
    for (let step = 0; step < minor; step++) {
      const b = a % 2 === 0 ? step : minor - 1 - step;
      let x = columnMajor ? a : b;
      let y = columnMajor ? b : a;
      if (mirrorX) x = width - 1 - x;
      if (mirrorY) y = height - 1 - y;
      order.push(y * width + x);
    }
  }
  return order;
}

/** Cut the serpentine walk into `districtCount` runs of equal length. */
export function serpentinePartition(grid: Grid, districtCount: number, orientation: number): Partition {
  const districtSize = grid.size / districtCount;
  const partition = new Array<number>(grid.size).fill(1);
  serpentineOrder(grid.width, grid.height, orientation).forEach((cell, k) => {
    partition[cell] = Math.floor(k / districtSize) + 1;
  });
  return partition;
}

function districtIsSound(grid: Grid, partition: Partition, rules: DistrictRules, districtId: number): boolean {
  const members: number[] = [];
  partition.forEach((id, i) => { if (id === districtId) members.push(i); });
  return checkDistrict(grid, partition, rules, districtId, members).valid;
}

/**
 * Attempt `swaps` random exchanges of one cell across a boundary for one
 * cell coming back, so both districts keep their size. A swap is kept only
 * when both districts stay valid under the level's rules.
 */
export function perturbPartition(
  grid: Grid,
  partition: Partition,
  rules: DistrictRules,
  rng: SeededRNG,
  swaps: number,
): Partition {
  let current = [...partition];

  for (let n = 0; n < swaps; n++) {
    const c = rng.nextInt(0, grid.size - 1);
    const from = current[c];
    if (from === undefined) continue;

    const into = rng.pick(grid.neighbors(c).map(i => current[i]).filter(id => id !== undefined && id !== from));
    if (into === undefined) continue;

    // A cell of `into` that still touches `from` once `c` has left it
    const candidates: number[] = [];
    for (let i = 0; i < grid.size; i++) {
      if (current[i] !== into) continue;
      if (grid.neighbors(i).some(j => j !== c && current[j] === from)) candidates.push(i);
    }
    const d = rng.pick(candidates);
    if (d === undefined) continue;

    const next = [...current];
    next[c] = into;
    next[d] = from;
    if (districtIsSound(grid, next, rules, from) && districtIsSound(grid, next, rules, into)) {
      current = next;
    }
  }

  return current;
}

/** Random orientation plus perturbation, all drawn from one RNG stream. */
export function randomPartition(
  grid: Grid,
  districtCount: number,
  rules: DistrictRules,
  rng: SeededRNG,
  swaps: number,
): Partition {
  const orientation = rng.nextInt(0, ORIENTATIONS - 1);
  return perturbPartition(grid, serpentinePartition(grid, districtCount, orientation), rules, rng, swaps);
}

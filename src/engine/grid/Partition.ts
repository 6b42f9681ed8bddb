// ─────────────────────────────────────────────
//  Partition helpers
//  A partition is a flat array of district ids, one per cell.
//  Pure functions, no side effects.
// ─────────────────────────────────────────────

import type { Partition } from '@/engine/data/types/Grid';

/** Partition with every cell in the same district. */
export function createPartition(size: number, districtId = 1): Partition {
  return new Array<number>(size).fill(districtId);
}

/**
 * Build a partition from row strings of district digits, e.g. `['1122', '1122']`.
 * Only supports up to nine districts; meant for fixtures.
 */
export function partitionFromRows(rows: string[]): Partition {
  const ids: number[] = [];
  for (const row of rows) {
    for (const ch of row) ids.push(Number.parseInt(ch, 10));
  }
  return ids;
}

export function isDistrictId(id: number, districtCount: number): boolean {
  return Number.isInteger(id) && id >= 1 && id <= districtCount;
}

/** Cell indices per district id; index 0 is unused. */
export function districtCells(partition: Partition, districtCount: number): number[][] {
  const cells: number[][] = Array.from({ length: districtCount + 1 }, () => []);
  partition.forEach((id, index) => {
    if (isDistrictId(id, districtCount)) cells[id]?.push(index);
  });
  return cells;
}

export function districtSizes(partition: Partition, districtCount: number): number[] {
  return districtCells(partition, districtCount).map(c => c.length);
}

/** Indices whose district differs between two partitions of the same grid. */
export function changedCells(before: Partition, after: Partition): number[] {
  const changed: number[] = [];
  const len = Math.max(before.length, after.length);
  for (let i = 0; i < len; i++) {
    if (before[i] !== after[i]) changed.push(i);
  }
  return changed;
}

/** Districts a set of changed cells left or entered, ascending. */
export function touchedDistricts(before: Partition, after: Partition, changed: number[]): number[] {
  const ids = new Set<number>();
  for (const i of changed) {
    const prev = before[i];
    const next = after[i];
    if (prev !== undefined) ids.add(prev);
    if (next !== undefined) ids.add(next);
  }
  return [...ids].sort((a, b) => a - b);
}

export function samePartition(a: Partition, b: Partition): boolean {
  return a.length === b.length && a.every((id, i) => b[i] === id);
}

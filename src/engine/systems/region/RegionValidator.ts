// ─────────────────────────────────────────────
//  Region Validator
//  Checks that every district is one 4-connected region,
//  encloses no other cells (unless the level allows holes),
//  and respects the level's size limits.
//  Pure functions — the verdict is rebuilt, never patched in place.
// ─────────────────────────────────────────────

import type { Partition } from '@/engine/data/types/Grid';
import type { DistrictRules } from '@/engine/data/types/Level';
import type { Grid } from '@/engine/grid/Grid';
import { districtCells, isDistrictId } from '@/engine/grid/Partition';

export type DistrictIssue = 'EMPTY' | 'DISCONNECTED' | 'HOLE' | 'TOO_SMALL' | 'TOO_LARGE';

export interface DistrictVerdict {
  districtId: number;
  cellCount: number;
  /** Number of separate 4-connected pieces (0 when empty) */
  components: number;
  connected: boolean;
  issues: DistrictIssue[];
  valid: boolean;
}

export interface ValidationReport {
  valid: boolean;
  /** One verdict per district, ordered by id (index 0 = district 1) */
  districts: DistrictVerdict[];
  /** Ids of districts with at least one issue, ascending */
  invalidDistricts: number[];
  /** Cell indices not mapped to any of the K districts */
  strayCells: number[];
}

// 8-neighbourhood for flood-filling the complement of a district
const DIRS_8: [number, number][] = [
  [1, 0], [-1, 0], [0, 1], [0, -1],
  [1, 1], [1, -1], [-1, 1], [-1, -1],
];

/**
 * Count the 4-connected pieces of a district.
 * BFS from one member over same-district neighbours; repeat for anything unvisited.
 */
export function countComponents(grid: Grid, partition: Partition, members: number[], districtId: number): number {
  const visited = new Set<number>();
  let components = 0;

  for (const start of members) {
    if (visited.has(start)) continue;
    components++;
    visited.add(start);
    const queue = [start];
    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      if (current === undefined) break;
      for (const n of grid.neighbors(current)) {
        if (visited.has(n) || partition[n] !== districtId) continue;
        visited.add(n);
        queue.push(n);
      }
    }
  }

  return components;
}

/**
 * A district has a hole when some cells outside it cannot reach the grid
 * border without crossing it. The outside is filled with 8-connectivity,
 * the dual of the 4-connectivity used for districts.
 */
export function hasHole(grid: Grid, partition: Partition, districtId: number): boolean {
  const outside = new Set<number>();
  const queue: number[] = [];

  for (let i = 0; i < grid.size; i++) {
    if (partition[i] !== districtId && grid.isBorder(i)) {
      outside.add(i);
      queue.push(i);
    }
  }

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (current === undefined) break;
    const { x, y } = grid.posOf(current);
    for (const [dx, dy] of DIRS_8) {
      const nx = x + dx;
      const ny = y + dy;
      if (nx < 0 || nx >= grid.width || ny < 0 || ny >= grid.height) continue;
      const n = ny * grid.width + nx;
      if (outside.has(n) || partition[n] === districtId) continue;
      outside.add(n);
      queue.push(n);
    }
  }

  let memberCount = 0;
  for (let i = 0; i < grid.size; i++) {
    if (partition[i] === districtId) memberCount++;
  }
  return outside.size + memberCount < grid.size;
}

/** Verdict for one district, independent of the others. */
export function checkDistrict(
  grid: Grid,
  partition: Partition,
  rules: DistrictRules,
  districtId: number,
  members: number[],
): DistrictVerdict {
  const cellCount = members.length;
  const components = countComponents(grid, partition, members, districtId);
  const issues: DistrictIssue[] = [];

  if (cellCount === 0) issues.push('EMPTY');
  if (components > 1) issues.push('DISCONNECTED');
  if (cellCount > 0 && !rules.allowHoles && hasHole(grid, partition, districtId)) issues.push('HOLE');
  if (rules.minDistrictSize != null && cellCount < rules.minDistrictSize) issues.push('TOO_SMALL');
  if (rules.maxDistrictSize != null && cellCount > rules.maxDistrictSize) issues.push('TOO_LARGE');

  return {
    districtId,
    cellCount,
    components,
    connected: components === 1,
    issues,
    valid: issues.length === 0,
  };
}

function findStrayCells(grid: Grid, partition: Partition, districtCount: number): number[] {
  const stray: number[] = [];
  const len = Math.max(grid.size, partition.length);
  for (let i = 0; i < len; i++) {
    const id = partition[i];
    if (i >= grid.size || id === undefined || !isDistrictId(id, districtCount)) stray.push(i);
  }
  return stray;
}

function buildReport(districts: DistrictVerdict[], strayCells: number[]): ValidationReport {
  const invalidDistricts = districts.filter(d => !d.valid).map(d => d.districtId);
  return {
    valid: invalidDistricts.length === 0 && strayCells.length === 0,
    districts,
    invalidDistricts,
    strayCells,
  };
}

/** Full validation pass over all K districts. */
export function validatePartition(
  grid: Grid,
  partition: Partition,
  rules: DistrictRules,
  districtCount: number,
): ValidationReport {
  const cells = districtCells(partition, districtCount);
  const districts: DistrictVerdict[] = [];
  for (let id = 1; id <= districtCount; id++) {
    districts.push(checkDistrict(grid, partition, rules, id, cells[id] ?? []));
  }
  return buildReport(districts, findStrayCells(grid, partition, districtCount));
}

/**
 * Re-check only the listed districts and keep the previous verdict for the rest.
 * Moving a cell between two districts cannot change the verdict of a third,
 * so passing the districts an edit left and entered gives the same report
 * as a full pass.
 */
export function revalidateDistricts(
  previous: ValidationReport,
  grid: Grid,
  partition: Partition,
  rules: DistrictRules,
  districtIds: number[],
): ValidationReport {
  const districtCount = previous.districts.length;
  const recheck = new Set(districtIds.filter(id => isDistrictId(id, districtCount)));
  if (recheck.size === 0) {
    return buildReport(previous.districts, findStrayCells(grid, partition, districtCount));
  }

  const cells = districtCells(partition, districtCount);
  const districts = previous.districts.map(verdict =>
    recheck.has(verdict.districtId)
      ? checkDistrict(grid, partition, rules, verdict.districtId, cells[verdict.districtId] ?? [])
      : verdict,
  );
  return buildReport(districts, findStrayCells(grid, partition, districtCount));
}

export const RegionValidator = { validate: validatePartition, revalidate: revalidateDistricts };

import { describe, it, expect } from 'vitest';
import { Grid } from '@/engine/grid/Grid';
import { partitionFromRows } from '@/engine/grid/Partition';
import {
  countComponents,
  hasHole,
  revalidateDistricts,
  validatePartition,
} from '@/engine/systems/region/RegionValidator';
import { serpentinePartition, ORIENTATIONS } from '@/engine/systems/generator/PartitionBuilder';
import type { DistrictRules } from '@/engine/data/types/Level';
import { DEFAULT_RULES } from '@/engine/data/types/Level';
import { PuzzleStore } from '@/engine/state/PuzzleStore';
import { AssignCellAction } from '@/engine/state/actions/AssignCellAction';
import { SeededRNG } from '@/engine/utils/MathUtils';
import { HALVES, SCENARIO_GRID, makeLevel } from '../integration/helpers';

const scenario = Grid.fromRows(SCENARIO_GRID);

describe('RegionValidator', () => {

  // ── Connectivity ──

  it('accepts two connected halves', () => {
    const report = validatePartition(scenario, partitionFromRows(HALVES), DEFAULT_RULES, 2);
    expect(report.valid).toBe(true);
    expect(report.invalidDistricts).toEqual([]);
    expect(report.strayCells).toEqual([]);
    expect(report.districts.map(d => d.cellCount)).toEqual([8, 8]);
    expect(report.districts.every(d => d.connected && d.components === 1)).toBe(true);
  });

  it('flags a district split into two blobs as DISCONNECTED', () => {
    const partition = partitionFromRows(['1122', '2222', '1122', '1122']);
    const report = validatePartition(scenario, partition, DEFAULT_RULES, 2);

    expect(report.valid).toBe(false);
    expect(report.invalidDistricts).toEqual([1]);
    expect(report.districts[0]).toEqual({
      districtId: 1,
      cellCount: 6,
      components: 2,
      connected: false,
      issues: ['DISCONNECTED'],
      valid: false,
    });
    expect(report.districts[1]?.valid).toBe(true);
  });

  it('countComponents counts separate 4-connected pieces', () => {
    // Diagonal contact does not connect
    const grid = Grid.filled(2, 2, 'A');
    const partition = partitionFromRows(['12', '21']);
    expect(countComponents(grid, partition, [0, 3], 1)).toBe(2);
    expect(countComponents(grid, partition, [1, 2], 2)).toBe(2);
  });

  it('reports every district of a serpentine cut as connected, in all orientations', () => {
    const grid = Grid.filled(5, 4, 'A');
    for (let orientation = 0; orientation < ORIENTATIONS; orientation++) {
      const report = validatePartition(grid, serpentinePartition(grid, 4, orientation), DEFAULT_RULES, 4);
      expect(report.districts.map(d => d.connected)).toEqual([true, true, true, true]);
      expect(report.valid).toBe(true);
    }
  });

  // ── Holes ──

  describe('holes', () => {
    const grid = Grid.filled(3, 3, 'A');
    const ring = partitionFromRows(['111', '121', '111']);

    it('flags a ring around another district as HOLE', () => {
      const report = validatePartition(grid, ring, DEFAULT_RULES, 2);
      expect(report.invalidDistricts).toEqual([1]);
      expect(report.districts[0]?.issues).toEqual(['HOLE']);
      expect(report.districts[0]?.connected).toBe(true);
      expect(report.districts[1]?.valid).toBe(true);
    });

    it('accepts the ring when the level allows holes', () => {
      const report = validatePartition(grid, ring, { allowHoles: true }, 2);
      expect(report.valid).toBe(true);
    });

    it('does not count a notch open to the border as a hole', () => {
      expect(hasHole(grid, partitionFromRows(['121', '121', '111']), 1)).toBe(false);
    });

    it('treats a diagonal gap as open: the outside flood is 8-connected', () => {
      // District 1 surrounds the centre on four sides; the corner (2,2) touches it diagonally
      const partition = partitionFromRows(['111', '121', '112']);
      expect(hasHole(grid, partition, 1)).toBe(false);
    });
  });

  // ── Empty, size and stray cells ──

  it('flags an empty district', () => {
    const report = validatePartition(Grid.filled(2, 2, 'A'), [1, 1, 1, 1], DEFAULT_RULES, 2);
    expect(report.valid).toBe(false);
    expect(report.invalidDistricts).toEqual([2]);
    expect(report.districts[1]).toMatchObject({ cellCount: 0, components: 0, connected: false, issues: ['EMPTY'] });
  });

  it('enforces min and max district sizes', () => {
    const rules: DistrictRules = { allowHoles: false, minDistrictSize: 2, maxDistrictSize: 2 };
    const report = validatePartition(Grid.filled(2, 2, 'A'), partitionFromRows(['11', '12']), rules, 2);
    expect(report.districts[0]?.issues).toEqual(['TOO_LARGE']);
    expect(report.districts[1]?.issues).toEqual(['TOO_SMALL']);
    expect(report.invalidDistricts).toEqual([1, 2]);
  });

  it('reports cells outside 1..K and partitions of the wrong length as stray', () => {
    const grid = Grid.filled(2, 2, 'A');
    const outOfRange = validatePartition(grid, [1, 1, 1, 0], DEFAULT_RULES, 1);
    expect(outOfRange.strayCells).toEqual([3]);
    expect(outOfRange.invalidDistricts).toEqual([]);
    expect(outOfRange.valid).toBe(false);

    expect(validatePartition(grid, [1, 1, 1], DEFAULT_RULES, 1).strayCells).toEqual([3]);
    expect(validatePartition(grid, [1, 1, 1, 1, 1], DEFAULT_RULES, 1).strayCells).toEqual([4]);
  });

  // ── Purity ──

  it('gives the same verdicts when re-run on an unchanged partition', () => {
    const partition = partitionFromRows(['1122', '2222', '1122', '1122']);
    const first = validatePartition(scenario, partition, DEFAULT_RULES, 2);
    const second = validatePartition(scenario, partition, DEFAULT_RULES, 2);
    expect(second).toEqual(first);
  });

  it('incremental revalidation matches a full pass and keeps untouched verdicts', () => {
    const grid = Grid.fromRows(['AAA', 'BBB']);
    const before = partitionFromRows(['123', '123']);
    const after = partitionFromRows(['113', '123']);
    const previous = validatePartition(grid, before, DEFAULT_RULES, 3);

    const incremental = revalidateDistricts(previous, grid, after, DEFAULT_RULES, [1, 2]);

    expect(incremental).toEqual(validatePartition(grid, after, DEFAULT_RULES, 3));
    expect(incremental.districts[2]).toBe(previous.districts[2]);
    expect(incremental.districts[0]?.cellCount).toBe(3);
    expect(incremental.districts[1]?.cellCount).toBe(1);
  });

  it('store revalidation matches a full pass across random edits', () => {
    // All-B grid: A can never carry a district, so the session stays open
    const base = makeLevel({
      grid: Array.from({ length: 6 }, () => 'BBBBBB'),
      partition: Array.from({ length: 6 }, () => '111111'),
      districtCount: 6,
    });
    const grid = base.grid;
    const store = new PuzzleStore();
    store.init({ ...base, initialPartition: serpentinePartition(grid, 6, 0) });
    const rng = new SeededRNG(2718);

    for (let edit = 0; edit < 400; edit++) {
      const pos = grid.posOf(rng.nextInt(0, grid.size - 1));
      const result = store.dispatch(new AssignCellAction(pos, rng.nextInt(1, 6)));
      expect(result.ok).toBe(true);

      const { partition, validation } = store.getState();
      expect(validation).toEqual(validatePartition(grid, partition, DEFAULT_RULES, 6));
    }
    expect(store.getState().status).toBe('EDITING');
  });
});

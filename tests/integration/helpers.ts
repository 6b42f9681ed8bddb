// ─────────────────────────────────────────────
//  Integration Test Helpers
//  Build headless puzzle sessions: no renderer, no browser.
//  Use store.dispatch(action) to drive edits programmatically.
// ─────────────────────────────────────────────

import { Grid } from '@/engine/grid/Grid';
import { partitionFromRows } from '@/engine/grid/Partition';
import type { DistrictRules, Level, LossCondition } from '@/engine/data/types/Level';
import { DEFAULT_RULES, defaultDistrictsToWin } from '@/engine/data/types/Level';
import type { Faction } from '@/engine/data/types/Grid';
import { PuzzleStore } from '@/engine/state/PuzzleStore';

export interface LevelFixture {
  /** Faction rows, e.g. `['AAB', 'BBA']` */
  grid: string[];
  /** District digit rows, same shape as `grid` */
  partition: string[];
  districtCount: number;
  faction?: Faction;
  districtsToWin?: number;
  moveLimit?: number;
  rules?: Partial<DistrictRules>;
}

/** Build a Level straight from row strings. */
export function makeLevel(fixture: LevelFixture): Level {
  const lossConditions: LossCondition[] = fixture.moveLimit != null
    ? [{ type: 'move_limit', moves: fixture.moveLimit }]
    : [];
  return {
    id: 'test',
    name: 'Test Level',
    grid: Grid.fromRows(fixture.grid),
    districtCount: fixture.districtCount,
    winCondition: {
      type: 'win_districts',
      faction: fixture.faction ?? 'A',
      districts: fixture.districtsToWin ?? defaultDistrictsToWin(fixture.districtCount),
    },
    lossConditions,
    rules: { ...DEFAULT_RULES, ...fixture.rules },
    initialPartition: partitionFromRows(fixture.partition),
  };
}

/** Store already initialised on the fixture. */
export function buildStore(fixture: LevelFixture): PuzzleStore {
  const store = new PuzzleStore();
  store.init(makeLevel(fixture));
  return store;
}

// ── Shared fixtures ──────────────────────────

/** 4x4, 10 A / 6 B. Split into left and right halves, each half is 5 A / 3 B. */
export const SCENARIO_GRID = [
  'ABAA',
  'AABA',
  'BAAB',
  'ABBA',
];

export const HALVES = [
  '1122',
  '1122',
  '1122',
  '1122',
];

/**
 * District 2 is the two B cells at the bottom; A carries only district 1.
 * Winning line: pull (3,3) into district 2, then (0,3); the bottom row
 * ties 2/2 and goes to A.
 */
export const BOTTOM_POCKET: LevelFixture = {
  grid: SCENARIO_GRID,
  partition: [
    '1111',
    '1111',
    '1111',
    '1221',
  ],
  districtCount: 2,
};

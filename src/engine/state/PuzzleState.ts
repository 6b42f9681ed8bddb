// ─────────────────────────────────────────────
//  Puzzle State — Immutable snapshot of one level session
// ─────────────────────────────────────────────

import type { Faction, Partition, Pos } from '@/engine/data/types/Grid';
import type { Level } from '@/engine/data/types/Level';
import type { ValidationReport } from '@/engine/systems/region/RegionValidator';
import type { OutcomeReport } from '@/engine/systems/outcome/OutcomeEvaluator';
import type { SessionStatus } from '@/engine/systems/session/SessionPhaseManager';
import { districtCells } from '@/engine/grid/Partition';

export interface PuzzleState {
  readonly level: Level;

  /** Current district id per cell */
  readonly partition: Partition;

  /** Derived after every edit */
  readonly validation: ValidationReport;

  /** Derived after every edit; null while the partition is invalid */
  readonly outcome: OutcomeReport | null;

  readonly status: SessionStatus;

  /** Accepted edits that changed the partition */
  readonly moves: number;

  /** Human-readable record of accepted edits */
  readonly actionLog: string[];

  /** Previous states for undo */
  readonly stateHistory: PuzzleState[];
}

/** Utility helpers for querying PuzzleState */
export const StateQuery = {
  districtAt(state: PuzzleState, pos: Pos): number | undefined {
    if (!state.level.grid.contains(pos)) return undefined;
    return state.partition[state.level.grid.indexOf(pos)];
  },

  factionAt(state: PuzzleState, pos: Pos): Faction | undefined {
    return state.level.grid.contains(pos) ? state.level.grid.factionAt(pos) : undefined;
  },

  cellsOf(state: PuzzleState, districtId: number): Pos[] {
    const cells = districtCells(state.partition, state.level.districtCount)[districtId] ?? [];
    return cells.map(i => state.level.grid.posOf(i));
  },

  isTerminal(state: PuzzleState): boolean {
    return state.status !== 'EDITING';
  },

  winnerOf(state: PuzzleState, districtId: number): Faction | undefined {
    return state.outcome?.districts.find(d => d.districtId === districtId)?.winner;
  },
};

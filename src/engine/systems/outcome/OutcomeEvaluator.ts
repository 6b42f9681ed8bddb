// ─────────────────────────────────────────────
//  Outcome Evaluator
//  Majority winner per district, district tally, objective check.
// ─────────────────────────────────────────────

import type { Faction, Partition } from '@/engine/data/types/Grid';
import type { WinCondition } from '@/engine/data/types/Level';
import type { Grid } from '@/engine/grid/Grid';
import { isDistrictId } from '@/engine/grid/Partition';

/** A district with equal A and B cells goes to this faction. */
export const TIE_BREAK_WINNER: Faction = 'A';

export type FactionCounts = Record<Faction, number>;

export interface DistrictOutcome {
  districtId: number;
  counts: FactionCounts;
  winner: Faction;
  /** Winner's cells minus loser's cells (0 on a tie) */
  margin: number;
  tied: boolean;
}

export interface OutcomeReport {
  /** Ordered by district id */
  districts: DistrictOutcome[];
  /** Districts won per faction */
  districtTally: FactionCounts;
  /** Raw cells per faction across the grid */
  cellTally: FactionCounts;
  objectiveMet: boolean;
}

export function districtWinner(counts: FactionCounts): Faction {
  if (counts.A === counts.B) return TIE_BREAK_WINNER;
  return counts.A > counts.B ? 'A' : 'B';
}

/** Fewest cells a faction needs to carry a district of `districtSize`. */
export function carryThreshold(districtSize: number, faction: Faction): number {
  const half = Math.floor(districtSize / 2);
  return districtSize % 2 === 0 && faction === TIE_BREAK_WINNER ? half : half + 1;
}

export function isObjectiveMet(condition: WinCondition, districtTally: FactionCounts): boolean {
  switch (condition.type) {
    case 'win_districts':
      return districtTally[condition.faction] >= condition.districts;
  }
}

/**
 * Tally every district. Callers only rely on the result for a valid
 * partition; cells outside 1..K are counted in `cellTally` only.
 */
export function evaluateOutcome(
  grid: Grid,
  partition: Partition,
  districtCount: number,
  winCondition: WinCondition,
): OutcomeReport {
  const counts: FactionCounts[] = Array.from({ length: districtCount }, () => ({ A: 0, B: 0 }));
  const cellTally: FactionCounts = { A: 0, B: 0 };

  for (let i = 0; i < grid.size; i++) {
    const faction = grid.factionAtIndex(i);
    cellTally[faction]++;
    const id = partition[i];
    if (id === undefined || !isDistrictId(id, districtCount)) continue;
    const bucket = counts[id - 1];
    if (bucket) bucket[faction]++;
  }

  const districtTally: FactionCounts = { A: 0, B: 0 };
  const districts = counts.map((c, idx): DistrictOutcome => {
    const winner = districtWinner(c);
    districtTally[winner]++;
    return {
      districtId: idx + 1,
      counts: c,
      winner,
      margin: Math.abs(c.A - c.B),
      tied: c.A === c.B,
    };
  });

  return {
    districts,
    districtTally,
    cellTally,
    objectiveMet: isObjectiveMet(winCondition, districtTally),
  };
}

export const OutcomeEvaluator = { evaluate: evaluateOutcome, winner: districtWinner, carryThreshold };

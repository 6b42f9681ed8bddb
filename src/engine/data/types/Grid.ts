// ─────────────────────────────────────────────
//  Grid / Partition Types
// ─────────────────────────────────────────────

export interface Pos {
  x: number;
  y: number;
}

/** The two sides a cell can belong to. 'A' is drawn blue, 'B' red. */
export type Faction = 'A' | 'B';

/**
 * District id for every cell, indexed by `y * width + x`.
 * Ids run from 1 to the level's district count.
 */
export type Partition = readonly number[];

/** Two orthogonally adjacent cells; dragging across it pulls `to` into `from`'s district. */
export interface BoundaryEdge {
  from: Pos;
  to: Pos;
}

export function otherFaction(faction: Faction): Faction {
  return faction === 'A' ? 'B' : 'A';
}

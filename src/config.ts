import type { Faction } from '@/engine/data/types/Grid';

export const TILE_SIZE = 52;
/** Gap drawn between neighbouring cells. */
export const TILE_GAP  = 2;

/** Pixel offset applied to all cell→screen conversions so the grid
 *  renders clear of the left score panel and the top status bar. */
export const MAP_OFFSET_X = 216;
export const MAP_OFFSET_Y = 88;

/** Snapshots kept for undo. */
export const MAX_HISTORY = 100;

/** Initial partitions tried before a level is declared trivial. */
export const MAX_INITIAL_ATTEMPTS = 64;

/** Fresh solution + colouring draws before generation gives up. */
export const MAX_GENERATION_ROUNDS = 32;

export interface FactionColors {
  /** Cell fill */
  regular: number;
  /** District tint for districts the faction wins */
  faded: number;
}

export const FACTION_PALETTE: Record<Faction, FactionColors> = {
  A: { regular: 0x0000cc, faded: 0x8080ff },
  B: { regular: 0xcc0000, faded: 0xff8080 },
};

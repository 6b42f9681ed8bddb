// ─────────────────────────────────────────────
//  GridLayout — pixel ↔ cell conversion
//  The input layer maps pointer positions with screenToCell()
//  before calling the coordinator.
// ─────────────────────────────────────────────

import type { Pos } from '@/engine/data/types/Grid';
import { TILE_SIZE, TILE_GAP, MAP_OFFSET_X, MAP_OFFSET_Y } from '@/config';

const PITCH = TILE_SIZE + TILE_GAP;

export const GridLayout = {
  /** Cell under a pixel, or null when the pixel is off the grid. */
  screenToCell(px: number, py: number, width: number, height: number): Pos | null {
    const x = Math.floor((px - MAP_OFFSET_X) / PITCH);
    const y = Math.floor((py - MAP_OFFSET_Y) / PITCH);
    if (x < 0 || x >= width || y < 0 || y >= height) return null;
    return { x, y };
  },

  /** Top-left pixel of a cell. */
  cellToScreen(pos: Pos): { px: number; py: number } {
    return {
      px: pos.x * PITCH + MAP_OFFSET_X,
      py: pos.y * PITCH + MAP_OFFSET_Y,
    };
  },
};

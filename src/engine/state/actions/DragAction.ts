// ─────────────────────────────────────────────
//  Drag Action — boundary drag as one batch
//  Every cell after the first joins the first cell's district.
//  The store validates once, against the final partition.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { Pos } from '@/engine/data/types/Grid';
import type { PuzzleState } from '@/engine/state/PuzzleState';
import type { EditRejection, PuzzleAction } from '@/engine/state/PuzzleAction';
import { reject } from '@/engine/state/PuzzleAction';
import { isDistrictId } from '@/engine/grid/Partition';

export class DragAction implements PuzzleAction {
  readonly type: string = 'DRAG';

  constructor(protected readonly path: readonly Pos[]) {}

  validate(state: PuzzleState): EditRejection | null {
    const { grid, districtCount } = state.level;
    if (this.path.length === 0) {
      return reject('EMPTY_EDIT', 'A drag needs at least one cell');
    }
    const outside = this.path.find(p => !grid.contains(p));
    if (outside) {
      return reject('OUT_OF_BOUNDS', `(${outside.x}, ${outside.y}) is outside the ${grid.width}x${grid.height} grid`);
    }
    const districtId = this.sourceDistrict(state);
    if (districtId === undefined || !isDistrictId(districtId, districtCount)) {
      return reject('INVALID_DISTRICT_ID', `Drag starts on a cell with no valid district`);
    }
    return null;
  }

  execute(state: PuzzleState): PuzzleState {
    const districtId = this.sourceDistrict(state);
    if (districtId === undefined) return state;

    const { grid } = state.level;
    const targets = this.path.slice(1)
      .map(p => grid.indexOf(p))
      .filter(i => state.partition[i] !== districtId);
    if (targets.length === 0) return state;

    return produce(state, draft => {
      for (const i of targets) draft.partition[i] = districtId;
      draft.actionLog.push(`${this.type.toLowerCase()} ${targets.length} cell(s) → ${districtId}`);
    });
  }

  private sourceDistrict(state: PuzzleState): number | undefined {
    const start = this.path[0];
    if (!start || !state.level.grid.contains(start)) return undefined;
    return state.partition[state.level.grid.indexOf(start)];
  }
}

import { produce } from 'immer';
import type { Pos } from '@/engine/data/types/Grid';
import type { PuzzleState } from '@/engine/state/PuzzleState';
import type { EditRejection, PuzzleAction } from '@/engine/state/PuzzleAction';
import { reject } from '@/engine/state/PuzzleAction';
import { isDistrictId } from '@/engine/grid/Partition';

/** Move a single cell into another district. Connectivity is not checked here. */
export class AssignCellAction implements PuzzleAction {
  readonly type = 'ASSIGN';

  constructor(
    private readonly pos: Pos,
    private readonly districtId: number,
  ) {}

  validate(state: PuzzleState): EditRejection | null {
    const { grid, districtCount } = state.level;
    if (!grid.contains(this.pos)) {
      return reject('OUT_OF_BOUNDS', `(${this.pos.x}, ${this.pos.y}) is outside the ${grid.width}x${grid.height} grid`);
    }
    if (!isDistrictId(this.districtId, districtCount)) {
      return reject('INVALID_DISTRICT_ID', `District ${this.districtId} is not in 1..${districtCount}`);
    }
    return null;
  }

  execute(state: PuzzleState): PuzzleState {
    const index = state.level.grid.indexOf(this.pos);
    if (state.partition[index] === this.districtId) return state;

    return produce(state, draft => {
      draft.partition[index] = this.districtId;
      draft.actionLog.push(`assign (${this.pos.x},${this.pos.y}) → ${this.districtId}`);
    });
  }
}

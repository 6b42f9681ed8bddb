import type { BoundaryEdge } from '@/engine/data/types/Grid';
import type { PuzzleState } from '@/engine/state/PuzzleState';
import type { EditRejection } from '@/engine/state/PuzzleAction';
import { reject } from '@/engine/state/PuzzleAction';
import { MathUtils } from '@/engine/utils/MathUtils';
import { DragAction } from './DragAction';

/** Drag across one boundary edge: `edge.to` joins `edge.from`'s district. */
export class SwapBoundaryAction extends DragAction {
  override readonly type = 'SWAP_BOUNDARY';

  constructor(private readonly edge: BoundaryEdge) {
    super([edge.from, edge.to]);
  }

  override validate(state: PuzzleState): EditRejection | null {
    const base = super.validate(state);
    if (base) return base;
    if (!MathUtils.isAdjacent(this.edge.from, this.edge.to)) {
      return reject(
        'NOT_ADJACENT',
        `(${this.edge.from.x}, ${this.edge.from.y}) and (${this.edge.to.x}, ${this.edge.to.y}) do not share an edge`,
      );
    }
    return null;
  }
}

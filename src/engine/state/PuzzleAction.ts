// ─────────────────────────────────────────────
//  Puzzle Action — Command pattern for partition edits
//  execute() only mutates the partition; the store derives
//  validity, outcome and status afterwards.
// ─────────────────────────────────────────────

import type { PuzzleState } from './PuzzleState';

export type EditErrorCode =
  | 'OUT_OF_BOUNDS'
  | 'INVALID_DISTRICT_ID'
  | 'NOT_ADJACENT'
  | 'EMPTY_EDIT'
  | 'SESSION_CLOSED'
  | 'NOTHING_TO_UNDO';

export interface EditRejection {
  code: EditErrorCode;
  message: string;
}

export interface EditSuccess {
  ok: true;
  state: PuzzleState;
  /** Cell indices whose district changed (empty for a no-op edit) */
  changed: number[];
}

export interface EditFailure extends EditRejection {
  ok: false;
}

export type EditResult = EditSuccess | EditFailure;

export interface PuzzleAction {
  readonly type: string;
  /** Null when the edit can be applied; otherwise why not. */
  validate(state: PuzzleState): EditRejection | null;
  execute(state: PuzzleState): PuzzleState;
}

export function reject(code: EditErrorCode, message: string): EditRejection {
  return { code, message };
}

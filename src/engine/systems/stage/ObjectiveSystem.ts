// ─────────────────────────────────────────────
//  ObjectiveSystem
//  Turns a derived session snapshot into WON / FAILED / EDITING.
//  Pure TypeScript — no presentation dependency.
// ─────────────────────────────────────────────

import type { LossCondition } from '@/engine/data/types/Level';
import type { PuzzleState } from '@/engine/state/PuzzleState';
import type { SessionStatus } from '@/engine/systems/session/SessionPhaseManager';

type ObjectiveInput = Pick<PuzzleState, 'level' | 'validation' | 'outcome' | 'moves'>;

function isLost(cond: LossCondition, state: ObjectiveInput): boolean {
  switch (cond.type) {
    case 'move_limit':
      return state.moves >= cond.moves;
  }
}

/**
 * Win is checked FIRST, so a winning edit that also uses up the
 * last allowed move still wins. Loss conditions are OR.
 */
export function evaluate(state: ObjectiveInput): SessionStatus {
  if (state.validation.valid && state.outcome?.objectiveMet === true) return 'WON';

  for (const cond of state.level.lossConditions ?? []) {
    if (isLost(cond, state)) return 'FAILED';
  }

  return 'EDITING';
}

/** Namespace export for cleaner API */
export const ObjectiveSystem = { evaluate };

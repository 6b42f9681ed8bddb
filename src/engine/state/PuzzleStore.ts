// ─────────────────────────────────────────────
//  Puzzle Store — single source of truth for a level session
//  Two phases per edit: the action mutates the partition,
//  then the store derives validity, outcome and status.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import { castDraft, produce } from 'immer';
import type { Level } from '@/engine/data/types/Level';
import type { PuzzleState } from './PuzzleState';
import type { EditFailure, EditResult, EditRejection, PuzzleAction } from './PuzzleAction';
import { reject } from './PuzzleAction';
import { changedCells, touchedDistricts } from '@/engine/grid/Partition';
import { revalidateDistricts, validatePartition } from '@/engine/systems/region/RegionValidator';
import type { ValidationReport } from '@/engine/systems/region/RegionValidator';
import { evaluateOutcome } from '@/engine/systems/outcome/OutcomeEvaluator';
import type { OutcomeReport } from '@/engine/systems/outcome/OutcomeEvaluator';
import { ObjectiveSystem } from '@/engine/systems/stage/ObjectiveSystem';
import { SessionPhaseManager } from '@/engine/systems/session/SessionPhaseManager';
import { EventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';
import { PuzzleError } from '@/engine/utils/errors';
import { MAX_HISTORY } from '@/config';

type StoreListener = (state: PuzzleState) => void;

function outcomeFor(level: Level, partition: PuzzleState['partition'], validation: ValidationReport): OutcomeReport | null {
  if (!validation.valid) return null;
  return evaluateOutcome(level.grid, partition, level.districtCount, level.winCondition);
}

/** Fresh session state for a level: initial partition, full validation pass. */
export function createInitialState(level: Level): PuzzleState {
  const partition = level.initialPartition;
  const validation = validatePartition(level.grid, partition, level.rules, level.districtCount);
  const outcome = outcomeFor(level, partition, validation);
  return {
    level,
    partition,
    validation,
    outcome,
    status: ObjectiveSystem.evaluate({ level, validation, outcome, moves: 0 }),
    moves: 0,
    actionLog: [],
    stateHistory: [],
  };
}

export class PuzzleStore {
  private state: PuzzleState | null = null;
  private listeners: StoreListener[] = [];
  readonly phaseManager = new SessionPhaseManager();

  /** Start a session on a level. Replaces any previous session. */
  init(level: Level): PuzzleState {
    this.phaseManager.reset();
    const state = createInitialState(level);
    this.state = state;

    EventBus.emit('levelStarted', { levelId: level.id, name: level.name, districtCount: level.districtCount });
    Logger.log(`${level.name} — ${level.districtCount} districts, ${level.grid.width}x${level.grid.height}`, 'system');
    this.settleStatus(state);
    this.notify();
    return this.getState();
  }

  get initialised(): boolean { return this.state !== null; }

  getState(): PuzzleState {
    if (!this.state) throw new PuzzleError('NOT_INITIALISED', 'PuzzleStore.init() has not been called');
    return this.state;
  }

  /** Apply an edit action. Rejected edits leave the state untouched. */
  dispatch(action: PuzzleAction): EditResult {
    const current = this.getState();
    if (this.phaseManager.isTerminal) {
      return this.fail(reject('SESSION_CLOSED', `Level is over (${current.status}); no more edits`));
    }

    const rejection = action.validate(current);
    if (rejection) return this.fail(rejection);

    const next = action.execute(current);
    const changed = changedCells(current.partition, next.partition);
    if (changed.length === 0) return { ok: true, state: current, changed };

    const { level } = current;
    const touched = touchedDistricts(current.partition, next.partition, changed);
    const validation = revalidateDistricts(current.validation, level.grid, next.partition, level.rules, touched);
    const outcome = outcomeFor(level, next.partition, validation);
    const moves = current.moves + 1;
    const status = ObjectiveSystem.evaluate({ level, validation, outcome, moves });

    // Snapshots are stored without their own history; undo() re-attaches it
    const snapshot: PuzzleState = { ...current, stateHistory: [] };
    const state = produce(next, (draft: Draft<PuzzleState>) => {
      draft.validation = castDraft(validation);
      draft.outcome = castDraft(outcome);
      draft.moves = moves;
      draft.status = status;
      draft.stateHistory.push(castDraft(snapshot));
      if (draft.stateHistory.length > MAX_HISTORY) {
        draft.stateHistory.shift();
      }
    });
    this.state = state;

    // Listeners may start another level; the result still describes this edit
    this.announce(current, state, changed);
    return { ok: true, state, changed };
  }

  /** Step back to the snapshot before the last accepted edit. */
  undo(): EditResult {
    const current = this.getState();
    if (this.phaseManager.isTerminal) {
      return this.fail(reject('SESSION_CLOSED', `Level is over (${current.status}); cannot undo`));
    }
    const previous = current.stateHistory[current.stateHistory.length - 1];
    if (!previous) return this.fail(reject('NOTHING_TO_UNDO', 'No edit to undo'));

    const restored: PuzzleState = { ...previous, stateHistory: current.stateHistory.slice(0, -1) };
    this.state = restored;
    const changed = changedCells(current.partition, restored.partition);
    this.announce(current, restored, changed);
    return { ok: true, state: restored, changed };
  }

  /** Back to the level's starting partition with a clean move count. */
  reset(): EditResult {
    const current = this.getState();
    if (this.phaseManager.isTerminal) {
      return this.fail(reject('SESSION_CLOSED', `Level is over (${current.status}); cannot reset`));
    }

    const fresh = createInitialState(current.level);
    this.state = fresh;
    const changed = changedCells(current.partition, fresh.partition);
    Logger.log('Level reset', 'edit');
    this.announce(current, fresh, changed);
    return { ok: true, state: fresh, changed };
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  private notify(): void {
    const state = this.state;
    if (!state) return;
    for (const listener of this.listeners) listener(state);
  }

  private fail(rejection: EditRejection): EditFailure {
    Logger.log(`Edit rejected: ${rejection.message}`, 'invalid');
    EventBus.emit('editRejected', { code: rejection.code, message: rejection.message });
    return { ok: false, ...rejection };
  }

  private announce(before: PuzzleState, after: PuzzleState, changed: number[]): void {
    if (changed.length > 0) {
      EventBus.emit('partitionChanged', { partition: after.partition, changed });
    }
    if (after.validation !== before.validation) {
      EventBus.emit('validityChanged', { report: after.validation });
      if (!after.validation.valid) {
        Logger.log(`Invalid districts: ${after.validation.invalidDistricts.join(', ')}`, 'invalid');
      }
    }
    if (after.outcome !== before.outcome) {
      EventBus.emit('outcomeChanged', { outcome: after.outcome });
    }
    this.settleStatus(after);
    this.notify();
  }

  private settleStatus(state: PuzzleState): void {
    if (state.status === 'EDITING') return;
    if (!this.phaseManager.transition(state.status)) return;

    const payload = { levelId: state.level.id, moves: state.moves };
    if (state.status === 'WON') {
      EventBus.emit('levelWon', payload);
      Logger.log(`✨ District map carried — ${state.moves} move(s)`, 'victory');
    } else {
      EventBus.emit('levelFailed', payload);
      Logger.log(`💀 Out of moves — ${state.moves} used`, 'defeat');
    }
  }
}

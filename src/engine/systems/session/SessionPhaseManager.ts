// ─────────────────────────────────────────────
//  Session Phase FSM
//  EDITING → WON | FAILED. Both outcomes are terminal.
// ─────────────────────────────────────────────

import { EventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';

export type SessionStatus = 'EDITING' | 'WON' | 'FAILED';

type TransitionMap = Record<SessionStatus, SessionStatus[]>;

const TRANSITIONS: TransitionMap = {
  EDITING: ['EDITING', 'WON', 'FAILED'],
  WON:     [],
  FAILED:  [],
};

export class SessionPhaseManager {
  private _status: SessionStatus = 'EDITING';

  get status(): SessionStatus { return this._status; }

  get isTerminal(): boolean { return TRANSITIONS[this._status].length === 0; }

  /** Attempt a transition. Returns false (and logs) when it is not allowed. */
  transition(next: SessionStatus): boolean {
    const allowed = TRANSITIONS[this._status];
    if (!allowed.includes(next)) {
      Logger.log(
        `[SessionPhaseManager] Invalid transition: ${this._status} → ${next}. Allowed: [${allowed.join(', ')}]`,
        'system',
      );
      return false;
    }
    if (next === this._status) return true;
    this._status = next;
    EventBus.emit('statusChanged', { status: next });
    return true;
  }

  reset(): void {
    this._status = 'EDITING';
  }
}

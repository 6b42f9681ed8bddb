// ─────────────────────────────────────────────
//  App Flow FSM
//  MENU → PLAYING → GAME_OVER → MENU
// ─────────────────────────────────────────────

import { EventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';

export type GameFlow = 'MENU' | 'PLAYING' | 'GAME_OVER';

const TRANSITIONS: Record<GameFlow, GameFlow[]> = {
  MENU:      ['PLAYING'],
  // PLAYING → PLAYING is moving on to the next level
  PLAYING:   ['PLAYING', 'MENU', 'GAME_OVER'],
  GAME_OVER: ['MENU'],
};

export class GameFlowManager {
  private _flow: GameFlow = 'MENU';

  get flow(): GameFlow { return this._flow; }

  transition(next: GameFlow): boolean {
    const allowed = TRANSITIONS[this._flow];
    if (!allowed.includes(next)) {
      Logger.log(
        `[GameFlowManager] Invalid transition: ${this._flow} → ${next}. Allowed: [${allowed.join(', ')}]`,
        'system',
      );
      return false;
    }
    this._flow = next;
    EventBus.emit('flowChanged', { flow: next });
    return true;
  }
}

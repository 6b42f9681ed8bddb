// ─────────────────────────────────────────────
//  Typed Event Bus
//  The session, coordinator and presentation layer
//  communicate through events.
// ─────────────────────────────────────────────

import type { Partition } from '@/engine/data/types/Grid';
import type { ValidationReport } from '@/engine/systems/region/RegionValidator';
import type { OutcomeReport } from '@/engine/systems/outcome/OutcomeEvaluator';
import type { SessionStatus } from '@/engine/systems/session/SessionPhaseManager';
import type { EditErrorCode } from '@/engine/state/PuzzleAction';
import type { GameFlow } from '@/engine/coordinator/GameFlowManager';

/** Centralised map of all game events and their payload types */
export interface GameEventMap {
  // Level lifecycle
  levelStarted:     { levelId: string; name: string; districtCount: number };
  levelWon:         { levelId: string; moves: number };
  levelFailed:      { levelId: string; moves: number };

  // Partition edits
  partitionChanged: { partition: Partition; changed: number[] };
  validityChanged:  { report: ValidationReport };
  outcomeChanged:   { outcome: OutcomeReport | null };
  editRejected:     { code: EditErrorCode; message: string };

  // Session / app flow
  statusChanged:    { status: SessionStatus };
  flowChanged:      { flow: GameFlow };

  // UI
  logMessage:       { text: string; cls: string };
}

type Listener<T> = (payload: T) => void;

type ListenerTable = { [K in keyof GameEventMap]?: Listener<GameEventMap[K]>[] };

class TypedEventBus {
  private listeners: ListenerTable = {};

  on<K extends keyof GameEventMap>(event: K, listener: Listener<GameEventMap[K]>): void {
    const arr: NonNullable<ListenerTable[K]> = this.listeners[event] ?? [];
    arr.push(listener);
    this.listeners[event] = arr;
  }

  off<K extends keyof GameEventMap>(event: K, listener: Listener<GameEventMap[K]>): void {
    const arr: Listener<GameEventMap[K]>[] | undefined = this.listeners[event];
    if (!arr) return;
    const idx = arr.indexOf(listener);
    if (idx !== -1) arr.splice(idx, 1);
  }

  emit<K extends keyof GameEventMap>(event: K, payload: GameEventMap[K]): void {
    const arr: Listener<GameEventMap[K]>[] | undefined = this.listeners[event];
    if (!arr) return;
    // Iterate a copy so listeners can safely remove themselves
    [...arr].forEach(fn => fn(payload));
  }

  /** Remove all listeners (useful for test teardown) */
  clear(): void {
    this.listeners = {};
  }
}

/** Singleton event bus — import this directly in any system */
export const EventBus = new TypedEventBus();

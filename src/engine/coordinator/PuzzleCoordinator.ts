import { PuzzleStore } from '@/engine/state/PuzzleStore';
import type { PuzzleState } from '@/engine/state/PuzzleState';
import type { EditFailure, EditResult } from '@/engine/state/PuzzleAction';
import { AssignCellAction } from '@/engine/state/actions/AssignCellAction';
import { SwapBoundaryAction } from '@/engine/state/actions/SwapBoundaryAction';
import { DragAction } from '@/engine/state/actions/DragAction';
import type { IRenderer } from '@/engine/renderer/IRenderer';
import type { BoundaryEdge, Pos } from '@/engine/data/types/Grid';
import type { Level } from '@/engine/data/types/Level';
import type { LevelRequest, NewLevelInfo } from '@/engine/systems/generator/LevelGenerator';
import { newLevel } from '@/engine/systems/generator/LevelGenerator';
import { levelCount } from '@/engine/loader/LevelCatalogLoader';
import { MathUtils } from '@/engine/utils/MathUtils';
import { Logger } from '@/engine/utils/Logger';
import type { GameFlow } from './GameFlowManager';
import { GameFlowManager } from './GameFlowManager';

/**
 * Glue between input, the session store and the renderer.
 * Owns the app flow and batches pointer drags into single edits.
 */
export class PuzzleCoordinator {
  readonly flowManager = new GameFlowManager();

  private level: Level | null = null;
  /** Catalogue index of the current level; null for seeded one-offs */
  private levelIndex: number | null = null;
  private dragPath: Pos[] = [];
  private readonly unsubscribe: () => void;

  constructor(
    private readonly renderer: IRenderer,
    readonly store: PuzzleStore = new PuzzleStore(),
  ) {
    this.unsubscribe = store.subscribe(state => this.onStateChange(state));
  }

  get flow(): GameFlow { return this.flowManager.flow; }
  get currentLevelIndex(): number | null { return this.levelIndex; }

  // ── Flow ───────────────────────────────────────

  /** From the menu, play the first catalogue level. */
  startGame(): NewLevelInfo | null {
    if (this.flow !== 'MENU') return null;
    return this.startLevel({ index: 0 });
  }

  startLevel(request: LevelRequest): NewLevelInfo | null {
    if (this.flow === 'GAME_OVER') return null;
    // Generation may throw; flow only changes once a level exists
    const info = newLevel(request);
    if (!this.go('PLAYING')) return null;

    this.level = info.level;
    this.levelIndex = 'index' in request ? request.index : null;
    this.dragPath = [];
    this.renderer.renderLevel(info.level);
    this.store.init(info.level);
    return info;
  }

  /** After a win: next catalogue level, or GAME_OVER past the last one. */
  nextLevel(): NewLevelInfo | null {
    if (this.flow !== 'PLAYING' || !this.store.initialised) return null;
    if (this.store.getState().status !== 'WON') {
      Logger.log('Win the current level before moving on', 'system');
      return null;
    }

    const next = this.levelIndex === null ? null : this.levelIndex + 1;
    if (next === null || next >= levelCount()) {
      this.go('GAME_OVER');
      return null;
    }
    return this.startLevel({ index: next });
  }

  /** Fresh session on the same level, allowed after WON or FAILED too. */
  retryLevel(): boolean {
    if (this.flow !== 'PLAYING' || !this.level) return false;
    this.dragPath = [];
    this.store.init(this.level);
    return true;
  }

  returnToMenu(): boolean {
    this.dragPath = [];
    return this.go('MENU');
  }

  // ── Pointer input (cell coordinates) ───────────

  onCellDown(pos: Pos): void {
    if (!this.acceptsInput()) return;
    this.dragPath = [pos];
  }

  onCellEnter(pos: Pos): void {
    const last = this.dragPath[this.dragPath.length - 1];
    if (!last) return;
    if (last.x === pos.x && last.y === pos.y) return;
    // Fast pointers can skip cells; only orthogonal steps extend the drag
    if (!MathUtils.isAdjacent(last, pos)) return;
    this.dragPath.push(pos);
  }

  /** Ends the drag; the whole path is applied as one edit. */
  onPointerUp(): EditResult | null {
    const path = this.dragPath;
    this.dragPath = [];
    if (path.length < 2 || !this.acceptsInput()) return null;
    return this.store.dispatch(new DragAction(path));
  }

  // ── Direct edits ───────────────────────────────

  assign(pos: Pos, districtId: number): EditResult {
    return this.acceptsInput() ? this.store.dispatch(new AssignCellAction(pos, districtId)) : this.notPlaying();
  }

  swapBoundary(edge: BoundaryEdge): EditResult {
    return this.acceptsInput() ? this.store.dispatch(new SwapBoundaryAction(edge)) : this.notPlaying();
  }

  undo(): EditResult {
    return this.acceptsInput() ? this.store.undo() : this.notPlaying();
  }

  reset(): EditResult {
    return this.acceptsInput() ? this.store.reset() : this.notPlaying();
  }

  destroy(): void {
    this.unsubscribe();
    this.renderer.destroy();
  }

  // ── Internals ──────────────────────────────────

  private acceptsInput(): boolean {
    return this.flow === 'PLAYING' && this.store.initialised;
  }

  private notPlaying(): EditFailure {
    return { ok: false, code: 'SESSION_CLOSED', message: `No level in play (${this.flow})` };
  }

  private go(flow: GameFlow): boolean {
    if (!this.flowManager.transition(flow)) return false;
    this.renderer.showFlow(flow);
    return true;
  }

  private onStateChange(state: PuzzleState): void {
    this.renderer.renderPartition(state.partition);
    this.renderer.highlightDistricts(state.validation.districts.filter(d => !d.valid));
    this.renderer.showOutcome(state.outcome);
    this.renderer.showStatus(state.status, state.moves);
  }
}

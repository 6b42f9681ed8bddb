// ─────────────────────────────────────────────
//  Entry point — district partition engine
//  Headless core: a presentation layer supplies an IRenderer
//  and forwards pointer input to PuzzleCoordinator.
// ─────────────────────────────────────────────

export * from './config';

export type { Pos, Faction, Partition, BoundaryEdge } from './engine/data/types/Grid';
export { otherFaction } from './engine/data/types/Grid';
export type {
  Level, LevelSpec, DistrictRules, WinCondition, LossCondition,
  WinDistrictsCondition, MoveLimitCondition,
} from './engine/data/types/Level';
export { DEFAULT_RULES, defaultDistrictsToWin } from './engine/data/types/Level';

export { Grid } from './engine/grid/Grid';
export * from './engine/grid/Partition';

export type { DistrictIssue, DistrictVerdict, ValidationReport } from './engine/systems/region/RegionValidator';
export { RegionValidator, validatePartition, revalidateDistricts } from './engine/systems/region/RegionValidator';
export type { FactionCounts, DistrictOutcome, OutcomeReport } from './engine/systems/outcome/OutcomeEvaluator';
export { OutcomeEvaluator, evaluateOutcome, carryThreshold, TIE_BREAK_WINNER } from './engine/systems/outcome/OutcomeEvaluator';
export { ObjectiveSystem } from './engine/systems/stage/ObjectiveSystem';
export type { SessionStatus } from './engine/systems/session/SessionPhaseManager';
export { SessionPhaseManager } from './engine/systems/session/SessionPhaseManager';

export type { PuzzleState } from './engine/state/PuzzleState';
export { StateQuery } from './engine/state/PuzzleState';
export type {
  PuzzleAction, EditResult, EditSuccess, EditFailure, EditRejection, EditErrorCode,
} from './engine/state/PuzzleAction';
export { PuzzleStore, createInitialState } from './engine/state/PuzzleStore';
export { AssignCellAction } from './engine/state/actions/AssignCellAction';
export { DragAction } from './engine/state/actions/DragAction';
export { SwapBoundaryAction } from './engine/state/actions/SwapBoundaryAction';

export type { GeneratedLevel, LevelRequest, NewLevelInfo } from './engine/systems/generator/LevelGenerator';
export {
  LevelGenerator, DEFAULT_LEVEL_SPEC, generateLevel, generateFromSpec, newLevel,
} from './engine/systems/generator/LevelGenerator';
export {
  loadLevelCatalog, setLevelCatalog, getLevelSpec, levelCount, parseLevelCatalog,
} from './engine/loader/LevelCatalogLoader';

export type { GameFlow } from './engine/coordinator/GameFlowManager';
export { GameFlowManager } from './engine/coordinator/GameFlowManager';
export { PuzzleCoordinator } from './engine/coordinator/PuzzleCoordinator';
export type { IRenderer } from './engine/renderer/IRenderer';
export { NullRenderer } from './engine/renderer/NullRenderer';
export { GridLayout } from './engine/input/GridLayout';

export type { GameEventMap } from './engine/utils/EventBus';
export { EventBus } from './engine/utils/EventBus';
export type { LogClass } from './engine/utils/Logger';
export { Logger } from './engine/utils/Logger';
export { MathUtils, SeededRNG } from './engine/utils/MathUtils';
export * from './engine/utils/errors';

// ─────────────────────────────────────────────
//  NullRenderer — No-op IRenderer for headless runs and tests
// ─────────────────────────────────────────────

import type { IRenderer } from '@/engine/renderer/IRenderer';
import type { Partition } from '@/engine/data/types/Grid';
import type { Level } from '@/engine/data/types/Level';
import type { DistrictVerdict } from '@/engine/systems/region/RegionValidator';
import type { OutcomeReport } from '@/engine/systems/outcome/OutcomeEvaluator';
import type { SessionStatus } from '@/engine/systems/session/SessionPhaseManager';
import type { GameFlow } from '@/engine/coordinator/GameFlowManager';

export class NullRenderer implements IRenderer {
  renderLevel(_level: Level): void {}
  renderPartition(_partition: Partition): void {}
  highlightDistricts(_invalid: DistrictVerdict[]): void {}
  showOutcome(_outcome: OutcomeReport | null): void {}
  showStatus(_status: SessionStatus, _moves: number): void {}
  showFlow(_flow: GameFlow): void {}
  destroy(): void {}
}

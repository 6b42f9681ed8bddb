import type { Partition } from '@/engine/data/types/Grid';
import type { Level } from '@/engine/data/types/Level';
import type { DistrictVerdict } from '@/engine/systems/region/RegionValidator';
import type { OutcomeReport } from '@/engine/systems/outcome/OutcomeEvaluator';
import type { SessionStatus } from '@/engine/systems/session/SessionPhaseManager';
import type { GameFlow } from '@/engine/coordinator/GameFlowManager';

/** Presentation port. The core pushes; the renderer never reads the store. */
export interface IRenderer {
  // ── Level ──────────────────────────────────────
  /** Called once per level: grid size, cell factions, district count. */
  renderLevel(level: Level): void;

  // ── Per edit ───────────────────────────────────
  /** Full redraw of district borders. */
  renderPartition(partition: Partition): void;

  /** Mark districts that are disconnected, holed, empty or out of size. */
  highlightDistricts(invalid: DistrictVerdict[]): void;

  /** Per-district winners and tally; null while the map is invalid. */
  showOutcome(outcome: OutcomeReport | null): void;

  showStatus(status: SessionStatus, moves: number): void;

  // ── Screens ────────────────────────────────────
  showFlow(flow: GameFlow): void;

  /** Clean up (called when the coordinator shuts down). */
  destroy(): void;
}

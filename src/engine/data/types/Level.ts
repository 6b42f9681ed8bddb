// ─────────────────────────────────────────────
//  Level Types
// ─────────────────────────────────────────────

import type { Grid } from '@/engine/grid/Grid';
import type { Faction, Partition } from './Grid';

// ── Objective conditions (discriminated unions) ────────────────────

/** Win: `faction` must carry at least `districts` districts. */
export interface WinDistrictsCondition {
  type: 'win_districts';
  faction: Faction;
  districts: number;
}

export type WinCondition = WinDistrictsCondition;

/** Lose: `moves` edits made without winning. */
export interface MoveLimitCondition {
  type: 'move_limit';
  moves: number;
}

export type LossCondition = MoveLimitCondition;

// ── District rules ────────────────────────────────────────────────

export interface DistrictRules {
  /** Whether a district may enclose cells of other districts. Default false. */
  allowHoles: boolean;
  minDistrictSize?: number;
  maxDistrictSize?: number;
}

export const DEFAULT_RULES: DistrictRules = { allowHoles: false };

// ── Level ─────────────────────────────────────────────────────────

export interface Level {
  id: string;
  name: string;
  grid: Grid;
  /** K; districts are numbered 1..K */
  districtCount: number;
  winCondition: WinCondition;
  /** Evaluated as OR after the win condition. Omitted = no way to lose. */
  lossConditions?: LossCondition[];
  rules: DistrictRules;
  /** The partition the player starts from (and returns to on reset). */
  initialPartition: Partition;
}

// ── Catalogue entries (levels.json) ───────────────────────────────

export interface LevelSpec {
  name: string;
  width: number;
  height: number;
  districtCount: number;
  /** Faction the player plays. Default 'A'. */
  targetFaction?: Faction;
  /** Default: strict majority of districts. */
  districtsToWin?: number;
  moveLimit?: number;
  allowHoles?: boolean;
  minDistrictSize?: number;
  maxDistrictSize?: number;
  /** Explicit generator seed. Catalogue entries default to index + 1. */
  seed?: number;
  /** Random boundary swaps applied to each generated partition. */
  shuffles?: number;
}

/** Strict majority of K districts. */
export function defaultDistrictsToWin(districtCount: number): number {
  return Math.floor(districtCount / 2) + 1;
}

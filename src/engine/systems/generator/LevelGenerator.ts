// ─────────────────────────────────────────────
//  Level Generator
//  Deterministic per seed. Solvable by construction:
//    1. build the winning partition (the solution)
//    2. colour cells so the target faction carries exactly
//       `districtsToWin` solution districts with the fewest cells
//       the tie-break allows, never more than half the grid
//    3. draw a different, valid, non-winning starting partition
// ─────────────────────────────────────────────

import type { Faction, Partition } from '@/engine/data/types/Grid';
import { otherFaction } from '@/engine/data/types/Grid';
import type { DistrictRules, Level, LevelSpec, LossCondition, WinCondition } from '@/engine/data/types/Level';
import { defaultDistrictsToWin } from '@/engine/data/types/Level';
import { Grid } from '@/engine/grid/Grid';
import { districtCells, samePartition } from '@/engine/grid/Partition';
import { validatePartition } from '@/engine/systems/region/RegionValidator';
import { carryThreshold, evaluateOutcome } from '@/engine/systems/outcome/OutcomeEvaluator';
import { getLevelSpec } from '@/engine/loader/LevelCatalogLoader';
import { SeededRNG } from '@/engine/utils/MathUtils';
import { LevelGenerationError } from '@/engine/utils/errors';
import { Logger } from '@/engine/utils/Logger';
import { MAX_GENERATION_ROUNDS, MAX_INITIAL_ATTEMPTS } from '@/config';
import { randomPartition } from './PartitionBuilder';

export const DEFAULT_LEVEL_SPEC: LevelSpec = {
  name: 'Random Map',
  width: 6,
  height: 6,
  districtCount: 6,
};

export type LevelRequest =
  | { index: number }
  | { seed: number; spec?: LevelSpec };

export interface GeneratedLevel {
  level: Level;
  initialPartition: Partition;
  /** The partition the generator built the level around; always wins */
  solution: Partition;
  seed: number;
}

/** What the presentation layer needs once, at level start. */
export interface NewLevelInfo {
  level: Level;
  initialPartition: Partition;
  districtCount: number;
  winCondition: WinCondition;
}

interface ResolvedSpec {
  spec: LevelSpec;
  targetFaction: Faction;
  districtsToWin: number;
  districtSize: number;
  /** Target cells that carry a district, tie-break included */
  carryShare: number;
  rules: DistrictRules;
  shuffles: number;
}

function invalid(spec: LevelSpec, reason: string): LevelGenerationError {
  return new LevelGenerationError('INVALID_LEVEL_SPEC', `Level '${spec.name}': ${reason}`, { name: spec.name });
}

/** Fill in defaults and reject specs no partition could satisfy. */
export function resolveSpec(spec: LevelSpec): ResolvedSpec {
  const { width, height, districtCount } = spec;
  if (![width, height, districtCount].every(n => Number.isInteger(n) && n > 0)) {
    throw invalid(spec, 'width, height and districtCount must be positive integers');
  }
  const cells = width * height;
  if (cells % districtCount !== 0) {
    throw invalid(spec, `${cells} cells cannot be split into ${districtCount} equal districts`);
  }
  const districtSize = cells / districtCount;
  // Each of these leaves exactly one equal-size partition, so nothing to redraw
  if (districtCount < 2 || districtSize < 2 || width < 2 || height < 2) {
    throw invalid(spec, `a ${width}x${height} grid in ${districtCount} district(s) has only one possible map`);
  }

  if (spec.minDistrictSize != null && districtSize < spec.minDistrictSize) {
    throw invalid(spec, `district size ${districtSize} is below minDistrictSize ${spec.minDistrictSize}`);
  }
  if (spec.maxDistrictSize != null && districtSize > spec.maxDistrictSize) {
    throw invalid(spec, `district size ${districtSize} is above maxDistrictSize ${spec.maxDistrictSize}`);
  }

  const districtsToWin = spec.districtsToWin ?? defaultDistrictsToWin(districtCount);
  if (!Number.isInteger(districtsToWin) || districtsToWin < 1 || districtsToWin > districtCount) {
    throw invalid(spec, `districtsToWin must be in 1..${districtCount}`);
  }

  const targetFaction = spec.targetFaction ?? 'A';
  const carryShare = carryThreshold(districtSize, targetFaction);
  const minimumCells = districtsToWin * carryShare;
  if (minimumCells * 2 > cells) {
    throw invalid(spec, `winning ${districtsToWin} districts needs ${minimumCells} of ${cells} cells; no minority left to gerrymander`);
  }

  return {
    spec,
    targetFaction,
    districtsToWin,
    districtSize,
    carryShare,
    rules: {
      allowHoles: spec.allowHoles ?? false,
      minDistrictSize: spec.minDistrictSize,
      maxDistrictSize: spec.maxDistrictSize,
    },
    shuffles: spec.shuffles ?? cells,
  };
}

/**
 * Colour the grid around the solution: winning districts get just enough of
 * the target faction to carry them (a tie when ties go its way), the others
 * fall short, and the target's total never exceeds half the grid.
 */
export function assignFactions(
  size: number,
  solution: Partition,
  resolved: ResolvedSpec,
  rng: SeededRNG,
): Faction[] {
  const { targetFaction, districtsToWin, carryShare, spec } = resolved;
  const ids = Array.from({ length: spec.districtCount }, (_, i) => i + 1);
  const winners = new Set(rng.shuffle(ids).slice(0, districtsToWin));

  const loseCap = carryShare - 1;
  let budget = Math.floor(size / 2) - districtsToWin * carryShare;

  const cells = new Array<Faction>(size).fill(otherFaction(targetFaction));
  const members = districtCells(solution, spec.districtCount);

  for (const id of ids) {
    let share: number;
    if (winners.has(id)) {
      share = carryShare;
    } else {
      share = Math.min(rng.nextInt(0, loseCap), budget);
      budget -= share;
    }
    for (const cell of rng.shuffle(members[id] ?? []).slice(0, share)) {
      cells[cell] = targetFaction;
    }
  }

  return cells;
}

function buildLevel(id: string, resolved: ResolvedSpec, grid: Grid, initialPartition: Partition): Level {
  const { spec, targetFaction, districtsToWin, rules } = resolved;
  const lossConditions: LossCondition[] = spec.moveLimit != null
    ? [{ type: 'move_limit', moves: spec.moveLimit }]
    : [];
  return {
    id,
    name: spec.name,
    grid,
    districtCount: spec.districtCount,
    winCondition: { type: 'win_districts', faction: targetFaction, districts: districtsToWin },
    lossConditions,
    rules,
    initialPartition,
  };
}

/**
 * One attempt: draw a solution, colour the grid around it, then look for a
 * starting partition that does not already win. Null when none turned up.
 */
function drawLevel(resolved: ResolvedSpec, seed: number, id: string, rng: SeededRNG): GeneratedLevel | null {
  const { spec } = resolved;
  const { districtCount } = spec;
  const geometry = Grid.filled(spec.width, spec.height, 'A');

  const solution = randomPartition(geometry, districtCount, resolved.rules, rng, resolved.shuffles);
  const grid = new Grid(spec.width, spec.height, assignFactions(geometry.size, solution, resolved, rng));

  const draft = buildLevel(id, resolved, grid, solution);
  const solutionReport = validatePartition(grid, solution, draft.rules, districtCount);
  const solutionOutcome = evaluateOutcome(grid, solution, districtCount, draft.winCondition);
  if (!solutionReport.valid || !solutionOutcome.objectiveMet) {
    throw new LevelGenerationError(
      'UNSOLVABLE_LEVEL',
      `Level '${spec.name}' (seed ${seed}): generated solution does not win`,
      { seed, invalidDistricts: solutionReport.invalidDistricts },
    );
  }

  for (let attempt = 0; attempt < MAX_INITIAL_ATTEMPTS; attempt++) {
    const candidate = randomPartition(geometry, districtCount, resolved.rules, rng, resolved.shuffles);
    if (samePartition(candidate, solution)) continue;
    if (!validatePartition(grid, candidate, draft.rules, districtCount).valid) continue;
    if (evaluateOutcome(grid, candidate, districtCount, draft.winCondition).objectiveMet) continue;

    return { level: { ...draft, initialPartition: candidate }, initialPartition: candidate, solution, seed };
  }
  return null;
}

/** Build a level from a spec and seed. Throws LevelGenerationError on a defect. */
export function generateFromSpec(spec: LevelSpec, seed: number, id = `seed-${seed}`): GeneratedLevel {
  const resolved = resolveSpec(spec);
  const rng = new SeededRNG(seed);

  // Later rounds continue the same RNG stream, so the result is still fixed per seed
  for (let round = 0; round < MAX_GENERATION_ROUNDS; round++) {
    const generated = drawLevel(resolved, seed, id, rng);
    if (generated) return generated;
    Logger.log(`Level '${spec.name}' (seed ${seed}): round ${round + 1} found no losing start, redrawing`, 'system');
  }

  throw new LevelGenerationError(
    'TRIVIAL_LEVEL',
    `Level '${spec.name}' (seed ${seed}): every starting partition already wins`,
    { seed },
  );
}

/** Catalogue entry by index, or an explicit seed (default spec unless given). */
export function generateLevel(request: LevelRequest): GeneratedLevel {
  if ('index' in request) {
    const spec = getLevelSpec(request.index);
    return generateFromSpec(spec, spec.seed ?? request.index + 1, `level-${request.index + 1}`);
  }
  return generateFromSpec(request.spec ?? DEFAULT_LEVEL_SPEC, request.seed);
}

export function newLevel(request: LevelRequest): NewLevelInfo {
  const { level, initialPartition } = generateLevel(request);
  return {
    level,
    initialPartition,
    districtCount: level.districtCount,
    winCondition: level.winCondition,
  };
}

export const LevelGenerator = { generate: generateLevel, fromSpec: generateFromSpec, newLevel };

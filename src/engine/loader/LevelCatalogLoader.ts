// ─────────────────────────────────────────────
//  LevelCatalogLoader
//  Reads the ordered level list from data/levels.json.
//  Call loadLevelCatalog() once before starting the coordinator;
//  tests inject their own list with setLevelCatalog().
// ─────────────────────────────────────────────

import { z } from 'zod';
import type { LevelSpec } from '@/engine/data/types/Level';
import { LevelCatalogError } from '@/engine/utils/errors';
import levelsJson from '@/engine/data/levels.json';

const positiveInt = z.number().int().min(1);

export const LevelSpecSchema = z.object({
  name: z.string().min(1),
  width: positiveInt,
  height: positiveInt,
  districtCount: positiveInt,
  targetFaction: z.enum(['A', 'B']).optional(),
  districtsToWin: positiveInt.optional(),
  moveLimit: positiveInt.optional(),
  allowHoles: z.boolean().optional(),
  minDistrictSize: positiveInt.optional(),
  maxDistrictSize: positiveInt.optional(),
  seed: z.number().int().min(0).optional(),
  shuffles: z.number().int().min(0).optional(),
}).strict();

export const LevelCatalogSchema = z.array(LevelSpecSchema).min(1);

let _catalog: LevelSpec[] | null = null;

/** Validate raw catalogue data; throws LevelCatalogError naming the first bad field. */
export function parseLevelCatalog(raw: unknown): LevelSpec[] {
  const parsed = LevelCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue ? issue.path.join('.') : '';
    throw new LevelCatalogError(
      `Invalid level catalogue at '${path}': ${issue?.message ?? 'unknown error'}`,
      { path },
    );
  }
  return parsed.data;
}

/** Load (once) and return the bundled catalogue. */
export function loadLevelCatalog(): LevelSpec[] {
  if (!_catalog) _catalog = parseLevelCatalog(levelsJson);
  return _catalog;
}

/** For tests: replace the catalogue without touching levels.json. */
export function setLevelCatalog(levels: LevelSpec[] | null): void {
  _catalog = levels === null ? null : parseLevelCatalog(levels);
}

export function getLevelSpec(index: number): LevelSpec {
  const catalog = loadLevelCatalog();
  const spec = catalog[index];
  if (!spec) {
    throw new LevelCatalogError(`No level at index ${index} (catalogue has ${catalog.length})`, { index });
  }
  return spec;
}

export function levelCount(): number {
  return loadLevelCatalog().length;
}

// ─────────────────────────────────────────────
//  Grid — immutable faction ownership per cell
//  Built once per level by the LevelGenerator.
// ─────────────────────────────────────────────

import type { Faction, Pos } from '@/engine/data/types/Grid';
import { GridError } from '@/engine/utils/errors';

const DIRS: [number, number][] = [[1, 0], [-1, 0], [0, 1], [0, -1]];

export class Grid {
  private readonly cells: readonly Faction[];

  constructor(
    readonly width: number,
    readonly height: number,
    cells: readonly Faction[],
  ) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new GridError('INVALID_DIMENSIONS', `Grid dimensions must be positive integers, got ${width}x${height}`);
    }
    if (cells.length !== width * height) {
      throw new GridError(
        'INVALID_DIMENSIONS',
        `Grid ${width}x${height} needs ${width * height} cells, got ${cells.length}`,
      );
    }
    this.cells = Object.freeze([...cells]);
  }

  /** Build from row strings, e.g. `['AAB', 'BBA']`. */
  static fromRows(rows: string[]): Grid {
    const height = rows.length;
    const width = rows[0]?.length ?? 0;
    const cells: Faction[] = [];
    for (const row of rows) {
      if (row.length !== width) {
        throw new GridError('INVALID_DIMENSIONS', 'All grid rows must have the same length');
      }
      for (const ch of row) {
        if (ch !== 'A' && ch !== 'B') {
          throw new GridError('INVALID_DIMENSIONS', `Unknown faction '${ch}' in grid row`);
        }
        cells.push(ch);
      }
    }
    return new Grid(width, height, cells);
  }

  /** Uniform grid; the generator uses it for geometry before factions exist. */
  static filled(width: number, height: number, faction: Faction): Grid {
    return new Grid(width, height, new Array<Faction>(Math.max(0, width * height)).fill(faction));
  }

  get size(): number { return this.cells.length; }

  contains(pos: Pos): boolean {
    return Number.isInteger(pos.x) && Number.isInteger(pos.y)
      && pos.x >= 0 && pos.x < this.width
      && pos.y >= 0 && pos.y < this.height;
  }

  /** Linear index of a position. Throws OUT_OF_BOUNDS outside the grid. */
  indexOf(pos: Pos): number {
    if (!this.contains(pos)) {
      throw new GridError(
        'OUT_OF_BOUNDS',
        `(${pos.x}, ${pos.y}) is outside the ${this.width}x${this.height} grid`,
        { x: pos.x, y: pos.y },
      );
    }
    return pos.y * this.width + pos.x;
  }

  posOf(index: number): Pos {
    return { x: index % this.width, y: Math.floor(index / this.width) };
  }

  factionAt(pos: Pos): Faction {
    return this.factionAtIndex(this.indexOf(pos));
  }

  factionAtIndex(index: number): Faction {
    const faction = this.cells[index];
    if (faction === undefined) {
      throw new GridError('OUT_OF_BOUNDS', `Cell index ${index} is outside the grid`, { index });
    }
    return faction;
  }

  /** Indices of the 4-connected neighbours of a cell. */
  neighbors(index: number): number[] {
    const { x, y } = this.posOf(index);
    const result: number[] = [];
    for (const [dx, dy] of DIRS) {
      const nx = x + dx;
      const ny = y + dy;
      if (nx < 0 || nx >= this.width || ny < 0 || ny >= this.height) continue;
      result.push(ny * this.width + nx);
    }
    return result;
  }

  isBorder(index: number): boolean {
    const { x, y } = this.posOf(index);
    return x === 0 || y === 0 || x === this.width - 1 || y === this.height - 1;
  }

  count(faction: Faction): number {
    return this.cells.filter(c => c === faction).length;
  }

  toRows(): string[] {
    const rows: string[] = [];
    for (let y = 0; y < this.height; y++) {
      rows.push(this.cells.slice(y * this.width, (y + 1) * this.width).join(''));
    }
    return rows;
  }
}

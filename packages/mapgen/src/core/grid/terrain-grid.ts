/**
 * Flat terrain grid backed by a Uint8Array.
 *
 * Cells are addressed as `index = x + y * width`. The grid has no mutators:
 * it is assembled once from a byte array and only hands out copies.
 */

import { DIRECTIONS_4, DIRECTIONS_8, type Point } from "../geometry/types";
import {
  isHazardTerrain,
  isNavigableTerrain,
  Terrain,
  toTerrain,
} from "./types";

/**
 * Legend shared by `fromRows` and the ASCII renderer
 */
export const TERRAIN_CHARS: Readonly<Record<Terrain, string>> = {
  [Terrain.WATER]: "~",
  [Terrain.MUD]: ",",
  [Terrain.GRASS]: ".",
  [Terrain.TREE]: "T",
};

function terrainFromChar(char: string): Terrain {
  switch (char) {
    case "~":
      return Terrain.WATER;
    case ",":
      return Terrain.MUD;
    case ".":
      return Terrain.GRASS;
    case "T":
      return Terrain.TREE;
    default:
      throw new Error(`Unknown terrain character: '${char}'`);
  }
}

export class TerrainGrid {
  readonly width: number;
  readonly height: number;
  private readonly data: Uint8Array;

  private constructor(width: number, height: number, data: Uint8Array) {
    this.width = width;
    this.height = height;
    this.data = data;
  }

  /**
   * Wrap a copy of `data`. Length must equal `width * height`.
   */
  static fromData(width: number, height: number, data: Uint8Array): TerrainGrid {
    if (width <= 0 || height <= 0) {
      throw new Error(`Invalid grid dimensions: ${width}x${height}`);
    }
    if (data.length !== width * height) {
      throw new Error(
        `Terrain data has ${data.length} cells, expected ${width * height}`,
      );
    }
    return new TerrainGrid(width, height, new Uint8Array(data));
  }

  static filled(width: number, height: number, terrain: Terrain): TerrainGrid {
    if (width <= 0 || height <= 0) {
      throw new Error(`Invalid grid dimensions: ${width}x${height}`);
    }
    const data = new Uint8Array(width * height);
    data.fill(terrain);
    return new TerrainGrid(width, height, data);
  }

  /**
   * Build a grid from text rows using the `~ , . T` legend.
   *
   * @example
   * ```typescript
   * const grid = TerrainGrid.fromRows(["TTT", "T.T", "TTT"]);
   * ```
   */
  static fromRows(rows: readonly string[]): TerrainGrid {
    const height = rows.length;
    const width = rows[0]?.length ?? 0;
    if (height === 0 || width === 0) {
      throw new Error("Terrain rows must not be empty");
    }

    const data = new Uint8Array(width * height);
    rows.forEach((row, y) => {
      if (row.length !== width) {
        throw new Error(`Row ${y} has ${row.length} cells, expected ${width}`);
      }
      for (let x = 0; x < width; x++) {
        data[x + y * width] = terrainFromChar(row.charAt(x));
      }
    });
    return new TerrainGrid(width, height, data);
  }

  // ===========================================================================
  // INDEXING
  // ===========================================================================

  get size(): number {
    return this.data.length;
  }

  isInBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  isIndexInBounds(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.data.length;
  }

  toIndex(x: number, y: number): number {
    return x + y * this.width;
  }

  indexToX(index: number): number {
    return index % this.width;
  }

  indexToY(index: number): number {
    return Math.floor(index / this.width);
  }

  indexToPoint(index: number): Point {
    return { x: this.indexToX(index), y: this.indexToY(index) };
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  /**
   * Terrain at (x, y). Out-of-range coordinates read as TREE.
   */
  get(x: number, y: number): Terrain {
    if (!this.isInBounds(x, y)) return Terrain.TREE;
    return toTerrain(this.data[x + y * this.width]);
  }

  getAtIndex(index: number): Terrain {
    if (!this.isIndexInBounds(index)) return Terrain.TREE;
    return toTerrain(this.data[index]);
  }

  isNavigable(x: number, y: number): boolean {
    return this.isInBounds(x, y) && isNavigableTerrain(this.get(x, y));
  }

  isNavigableIndex(index: number): boolean {
    return this.isIndexInBounds(index) && isNavigableTerrain(this.getAtIndex(index));
  }

  /**
   * True for cells on the outermost row or column
   */
  isOnEdge(x: number, y: number): boolean {
    return x === 0 || y === 0 || x === this.width - 1 || y === this.height - 1;
  }

  // ===========================================================================
  // NEIGHBOURS
  // ===========================================================================

  /**
   * Visit in-bounds 4-neighbours in West, East, North, South order.
   */
  forEachNeighbor4(
    x: number,
    y: number,
    callback: (nx: number, ny: number, terrain: Terrain) => void,
  ): void {
    for (const dir of DIRECTIONS_4) {
      const nx = x + dir.x;
      const ny = y + dir.y;
      if (this.isInBounds(nx, ny)) {
        callback(nx, ny, this.get(nx, ny));
      }
    }
  }

  /**
   * Visit in-bounds 8-neighbours.
   */
  forEachNeighbor8(
    x: number,
    y: number,
    callback: (nx: number, ny: number, terrain: Terrain) => void,
  ): void {
    for (const dir of DIRECTIONS_8) {
      const nx = x + dir.x;
      const ny = y + dir.y;
      if (this.isInBounds(nx, ny)) {
        callback(nx, ny, this.get(nx, ny));
      }
    }
  }

  /**
   * Whether any in-bounds 8-neighbour is water or forest
   */
  hasHazardNeighbor(x: number, y: number): boolean {
    for (const dir of DIRECTIONS_8) {
      const nx = x + dir.x;
      const ny = y + dir.y;
      if (this.isInBounds(nx, ny) && isHazardTerrain(this.get(nx, ny))) {
        return true;
      }
    }
    return false;
  }

  // ===========================================================================
  // WHOLE-GRID OPERATIONS
  // ===========================================================================

  getRawDataCopy(): Uint8Array {
    return new Uint8Array(this.data);
  }

  countCells(terrain: Terrain): number {
    let count = 0;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] === terrain) count++;
    }
    return count;
  }

  equals(other: TerrainGrid): boolean {
    if (this.width !== other.width || this.height !== other.height) {
      return false;
    }
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] !== other.data[i]) {
        return false;
      }
    }
    return true;
  }
}

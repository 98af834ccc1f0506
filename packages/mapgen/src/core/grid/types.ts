/**
 * Terrain categories and region types.
 */

/**
 * Terrain categories, ordered from lowest to highest ground.
 * Anything below TREE can be walked on.
 */
export const Terrain = {
  WATER: 0,
  MUD: 1,
  GRASS: 2,
  TREE: 3,
} as const;

export type Terrain = (typeof Terrain)[keyof typeof Terrain];

export const TERRAIN_ORDER: readonly Terrain[] = [
  Terrain.WATER,
  Terrain.MUD,
  Terrain.GRASS,
  Terrain.TREE,
];

/**
 * Narrow a stored byte back to a terrain category. Bytes outside the known
 * range read as TREE, the blocking category.
 */
export function toTerrain(value: number | undefined): Terrain {
  switch (value) {
    case Terrain.WATER:
      return Terrain.WATER;
    case Terrain.MUD:
      return Terrain.MUD;
    case Terrain.GRASS:
      return Terrain.GRASS;
    default:
      return Terrain.TREE;
  }
}

export function isNavigableTerrain(terrain: Terrain): boolean {
  return terrain < Terrain.TREE;
}

/**
 * Terrain a house must not touch: open water or forest.
 */
export function isHazardTerrain(terrain: Terrain): boolean {
  return terrain === Terrain.WATER || terrain === Terrain.TREE;
}

/**
 * A connected set of cells sharing one navigability class.
 * Cells are linear indices in discovery order.
 */
export interface Region {
  readonly id: number;
  readonly cells: readonly number[];
  readonly size: number;
  readonly navigable: boolean;
}

/**
 * Flood fill configuration
 */
export interface FloodFillConfig {
  /**
   * Cells the fill may add after the start cell. Defaults to Infinity,
   * which yields the whole component.
   */
  readonly maxExpansions?: number;
  /**
   * Mask of `grid.size` bytes. Every cell the fill enqueues is set to 1 and
   * cells already set are never entered, so several fills can share one
   * mask. Defaults to a fresh mask.
   */
  readonly visited?: Uint8Array;
}

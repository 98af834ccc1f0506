/**
 * Interior filter: the part of a region where a structure fits.
 */

import { DIRECTIONS_8 } from "../../core/geometry/types";
import type { TerrainGrid } from "../../core/grid/terrain-grid";
import { isHazardTerrain } from "../../core/grid/types";

/**
 * Drop cells on the outer ring of the grid and cells with an in-bounds
 * 8-neighbour of water or forest. Input order is preserved.
 */
export function filterInterior(grid: TerrainGrid, cells: readonly number[]): number[] {
  return cells.filter((index) => {
    const x = grid.indexToX(index);
    const y = grid.indexToY(index);
    if (grid.isOnEdge(x, y)) return false;
    return !grid.hasHazardNeighbor(x, y);
  });
}

/**
 * House check: none of the 8 neighbours is water or forest. Neighbours
 * outside the grid count as hazards.
 */
export function hasHazardFreeNeighbourhood(grid: TerrainGrid, index: number): boolean {
  const x = grid.indexToX(index);
  const y = grid.indexToY(index);
  for (const dir of DIRECTIONS_8) {
    const nx = x + dir.x;
    const ny = y + dir.y;
    if (!grid.isInBounds(nx, ny)) return false;
    if (isHazardTerrain(grid.get(nx, ny))) return false;
  }
  return true;
}

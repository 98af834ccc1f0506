/**
 * Flood fill and region detection over a TerrainGrid.
 *
 * Fills stay inside the start cell's navigability class: a fill started on
 * grass spreads over water, mud and grass; a fill started on a tree spreads
 * over trees only.
 */

import { FastQueue } from "../data-structures/fast-queue";
import type { TerrainGrid } from "./terrain-grid";
import type { FloodFillConfig, Region } from "./types";

/**
 * Breadth-first fill from `startIndex` over 4-neighbours (W, E, N, S).
 *
 * Returns cells in visit order. With a finite `maxExpansions` the result is
 * the start cell plus at most `maxExpansions` further cells: a **partial**
 * component. Omit the budget to get the whole component.
 *
 * An out-of-range start yields an empty list.
 */
export function floodFill(
  grid: TerrainGrid,
  startIndex: number,
  config: FloodFillConfig = {},
): number[] {
  const { maxExpansions = Infinity } = config;
  if (!grid.isIndexInBounds(startIndex)) return [];

  const seen = config.visited ?? new Uint8Array(grid.size);
  if (seen.length !== grid.size) {
    throw new Error(`Visited mask has ${seen.length} cells, expected ${grid.size}`);
  }

  const startClass = grid.isNavigableIndex(startIndex);
  const queue = new FastQueue<number>();
  const cells: number[] = [];

  queue.enqueue(startIndex);
  seen[startIndex] = 1;

  while (!queue.isEmpty && cells.length <= maxExpansions) {
    const current = queue.dequeue();
    if (current === undefined) break;
    cells.push(current);

    grid.forEachNeighbor4(grid.indexToX(current), grid.indexToY(current), (nx, ny) => {
      const next = grid.toIndex(nx, ny);
      if (seen[next] === 1) return;
      if (grid.isNavigableIndex(next) !== startClass) return;
      seen[next] = 1;
      queue.enqueue(next);
    });
  }

  return cells;
}

/**
 * All maximal regions whose start cell passes `include`, discovered by a
 * scan in index order. Region ids follow discovery order. One visited mask
 * is shared by every fill, so the scan touches each cell a bounded number
 * of times.
 */
export function findRegions(
  grid: TerrainGrid,
  include: (index: number) => boolean = () => true,
): Region[] {
  const visited = new Uint8Array(grid.size);
  const regions: Region[] = [];

  for (let index = 0; index < grid.size; index++) {
    if (visited[index] === 1 || !include(index)) continue;

    const cells = floodFill(grid, index, { visited });

    regions.push({
      id: regions.length,
      cells,
      size: cells.length,
      navigable: grid.isNavigableIndex(index),
    });
  }

  return regions;
}

/**
 * The largest connected navigable region. A later region replaces the
 * current best only when strictly larger, so the first one found wins ties.
 *
 * @returns null when the grid has no navigable cell
 */
export function findLargestWalkableRegion(grid: TerrainGrid): Region | null {
  const regions = findRegions(grid, (index) => grid.isNavigableIndex(index));

  let largest: Region | null = null;
  for (const region of regions) {
    if (largest === null || region.size > largest.size) {
      largest = region;
    }
  }

  return largest;
}

/**
 * Interior filter and bucket partition tests
 */

import { describe, expect, it } from "vitest";
import { Terrain, TerrainGrid } from "../src/core/grid";
import {
  bucketKeyOf,
  isOnBucketBorder,
  partitionIntoBuckets,
} from "../src/passes/placement/partition";
import { filterInterior, hasHazardFreeNeighbourhood } from "../src/passes/regions/interior";
import { walledMeadow } from "./helpers";

function allCells(grid: TerrainGrid): number[] {
  return Array.from({ length: grid.size }, (_, index) => index);
}

describe("filterInterior", () => {
  it("drops edge cells and cells touching trees", () => {
    const grid = walledMeadow();
    const interior = filterInterior(grid, allCells(grid));

    expect(interior).toHaveLength(36);
    expect(interior[0]).toBe(grid.toIndex(2, 2));
    expect(interior[interior.length - 1]).toBe(grid.toIndex(7, 7));
  });

  it("drops only the outer ring of an open grid", () => {
    const grid = TerrainGrid.filled(4, 4, Terrain.GRASS);

    expect(filterInterior(grid, allCells(grid))).toEqual([5, 6, 9, 10]);
  });

  it("drops cells next to water but not the water cell itself", () => {
    const grid = TerrainGrid.fromRows(["....", ".~..", "....", "...."]);

    expect(filterInterior(grid, allCells(grid))).toEqual([5]);
  });
});

describe("hasHazardFreeNeighbourhood", () => {
  it("rejects trees and water around the cell", () => {
    const grid = walledMeadow();

    expect(hasHazardFreeNeighbourhood(grid, grid.toIndex(1, 1))).toBe(false);
    expect(hasHazardFreeNeighbourhood(grid, grid.toIndex(2, 2))).toBe(true);
  });

  it("counts cells outside the grid as hazards", () => {
    const grid = TerrainGrid.filled(3, 3, Terrain.GRASS);

    expect(hasHazardFreeNeighbourhood(grid, 0)).toBe(false);
    expect(hasHazardFreeNeighbourhood(grid, 4)).toBe(true);
  });

  it("allows mud", () => {
    const grid = TerrainGrid.fromRows([",,,", ",.,", ",,,"]);

    expect(hasHazardFreeNeighbourhood(grid, 4)).toBe(true);
  });
});

describe("bucket keys", () => {
  it("uses the bucket width as row stride", () => {
    expect(bucketKeyOf(0, 5, 5, 5)).toBe(5);
    expect(bucketKeyOf(25, 0, 5, 5)).toBe(5);
    expect(bucketKeyOf(7, 12, 5, 5)).toBe(11);
  });

  it("marks the first and last row and column of each bucket", () => {
    expect(isOnBucketBorder(0, 2, 5, 5)).toBe(true);
    expect(isOnBucketBorder(4, 2, 5, 5)).toBe(true);
    expect(isOnBucketBorder(2, 9, 5, 5)).toBe(true);
    expect(isOnBucketBorder(2, 2, 5, 5)).toBe(false);
    expect(isOnBucketBorder(6, 8, 5, 5)).toBe(false);
  });
});

describe("partitionIntoBuckets", () => {
  it("groups interior cells by bucket and skips bucket borders", () => {
    const grid = walledMeadow();
    const buckets = partitionIntoBuckets(grid, filterInterior(grid, allCells(grid)), 4, 4);

    expect([...buckets.keys()]).toEqual([0, 1, 4, 5]);
    expect(buckets.get(0)).toEqual([22]);
    expect(buckets.get(1)).toEqual([25, 26]);
    expect(buckets.get(4)).toEqual([52, 62]);
    expect(buckets.get(5)).toEqual([55, 56, 65, 66]);
  });

  it("keeps cells of different buckets at least two apart", () => {
    const grid = TerrainGrid.filled(30, 30, Terrain.GRASS);
    const buckets = partitionIntoBuckets(grid, filterInterior(grid, allCells(grid)), 5, 5);
    const keyed = [...buckets.entries()].flatMap(([key, cells]) =>
      cells.map((cell) => ({ key, x: grid.indexToX(cell), y: grid.indexToY(cell) })),
    );

    for (const a of keyed) {
      for (const b of keyed) {
        if (a.key === b.key) continue;
        expect(Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y))).toBeGreaterThanOrEqual(2);
      }
    }
  });
});

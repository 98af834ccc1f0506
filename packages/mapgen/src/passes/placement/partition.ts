/**
 * Placement buckets: the interior cut into coarse tiles so that houses
 * drawn from different buckets never touch.
 */

import type { TerrainGrid } from "../../core/grid/terrain-grid";

/** Bucket key → cells, in order of first appearance */
export type PlacementBuckets = Map<number, number[]>;

/**
 * Bucket key of a cell.
 *
 * The row stride is the bucket *width*, not the number of bucket columns.
 * On grids with more than `bucketW` bucket columns several tiles share a
 * key, and their cells land in one bucket.
 */
export function bucketKeyOf(x: number, y: number, bucketW: number, bucketH: number): number {
  return Math.floor(x / bucketW) + Math.floor(y / bucketH) * bucketW;
}

/**
 * Whether a cell lies on the first or last row or column of its bucket
 */
export function isOnBucketBorder(x: number, y: number, bucketW: number, bucketH: number): boolean {
  const bx = x % bucketW;
  const by = y % bucketH;
  return bx === 0 || bx === bucketW - 1 || by === 0 || by === bucketH - 1;
}

/**
 * Group `cells` by bucket, skipping bucket-border cells. Two cells kept in
 * different buckets are therefore at Chebyshev distance ≥ 2.
 */
export function partitionIntoBuckets(
  grid: TerrainGrid,
  cells: readonly number[],
  bucketW: number,
  bucketH: number,
): PlacementBuckets {
  const buckets: PlacementBuckets = new Map();

  for (const index of cells) {
    const x = grid.indexToX(index);
    const y = grid.indexToY(index);
    if (isOnBucketBorder(x, y, bucketW, bucketH)) continue;

    const key = bucketKeyOf(x, y, bucketW, bucketH);
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.push(index);
    } else {
      buckets.set(key, [index]);
    }
  }

  return buckets;
}

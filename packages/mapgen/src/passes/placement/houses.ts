/**
 * House placement for both factions.
 *
 * All draws come from the locations stream, in this order: ally bucket, ally
 * house, (ally units), enemy house count, bucket removals, enemy houses.
 */

import { MapGenError, type SeededRandom } from "@skirmish/contracts";
import type { TerrainGrid } from "../../core/grid/terrain-grid";
import type { TraceCollector } from "../../pipeline/types";
import { hasHazardFreeNeighbourhood } from "../regions/interior";
import type { PlacementBuckets } from "./partition";

export interface HousePick {
  readonly bucketKey: number;
  readonly house: number;
}

export interface EnemyHouses {
  readonly houses: readonly number[];
  readonly bucketKeys: readonly number[];
}

/**
 * Copy buckets so sampling can consume them
 */
export function cloneBuckets(
  buckets: ReadonlyMap<number, readonly number[]>,
): PlacementBuckets {
  const copy: PlacementBuckets = new Map();
  for (const [key, cells] of buckets) {
    copy.set(key, [...cells]);
  }
  return copy;
}

/**
 * Take a uniformly random bucket out of the pool.
 *
 * @throws {MapGenError} INSUFFICIENT_BUCKETS when the pool is empty
 */
export function pickAllyBucket(
  rng: SeededRandom,
  buckets: PlacementBuckets,
): { readonly bucketKey: number; readonly cells: readonly number[] } {
  const keys = [...buckets.keys()];
  const bucketKey = keys[rng.nextInt(keys.length)];
  if (bucketKey === undefined) {
    throw MapGenError.insufficientBuckets("No placement bucket left for the ally house", {
      buckets: 0,
    });
  }
  const cells = buckets.get(bucketKey) ?? [];
  buckets.delete(bucketKey);
  return { bucketKey, cells };
}

/**
 * Ally bucket and house. The house is any cell of the bucket; interior
 * cells already have a hazard-free neighbourhood.
 */
export function pickAllyHouse(rng: SeededRandom, buckets: PlacementBuckets): HousePick {
  const { bucketKey, cells } = pickAllyBucket(rng, buckets);

  const house = cells[rng.nextInt(cells.length)];
  if (house === undefined) {
    throw MapGenError.placementExhausted(`Ally bucket ${bucketKey} has no cells`, {
      bucket: bucketKey,
    });
  }
  return { bucketKey, house };
}

/**
 * Number of enemy houses: uniform in `[min, min(max, remaining))`.
 *
 * The upper bound is exclusive, so `max` itself is never drawn unless it
 * equals `min`.
 *
 * @throws {MapGenError} INSUFFICIENT_BUCKETS when fewer than `min` buckets remain
 */
export function pickEnemyHouseCount(
  rng: SeededRandom,
  remainingBuckets: number,
  minHouses: number,
  maxHouses: number,
): number {
  if (remainingBuckets < minHouses) {
    throw MapGenError.insufficientBuckets(
      `Need at least ${minHouses} buckets for enemy houses, ${remainingBuckets} left`,
      { remaining: remainingBuckets, minEnemyHouses: minHouses },
    );
  }
  return rng.nextIntBetween(minHouses, Math.min(maxHouses, remainingBuckets));
}

/**
 * Remove random keys until `count` remain. Survivors keep their order.
 */
export function selectEnemyBuckets(
  rng: SeededRandom,
  keys: readonly number[],
  count: number,
): number[] {
  const selected = [...keys];
  while (selected.length > count) {
    selected.splice(rng.nextInt(selected.length), 1);
  }
  return selected;
}

/**
 * One house per selected bucket. Candidates failing the neighbourhood check
 * are discarded, so each bucket costs at most its size in draws; a bucket
 * with no valid cell is skipped.
 *
 * @throws {MapGenError} PLACEMENT_EXHAUSTED when no bucket yields a house
 */
export function placeEnemyHouses(
  rng: SeededRandom,
  grid: TerrainGrid,
  buckets: PlacementBuckets,
  bucketKeys: readonly number[],
  trace: TraceCollector,
  passId: string,
): EnemyHouses {
  const houses: number[] = [];
  const placedKeys: number[] = [];

  for (const key of bucketKeys) {
    const candidates = buckets.get(key) ?? [];
    let house: number | undefined;

    while (candidates.length > 0) {
      const index = rng.nextInt(candidates.length);
      const [candidate] = candidates.splice(index, 1);
      if (candidate !== undefined && hasHazardFreeNeighbourhood(grid, candidate)) {
        house = candidate;
        break;
      }
    }

    if (house === undefined) {
      trace.warning(passId, `Bucket ${key} has no valid house cell; skipped`);
      continue;
    }
    houses.push(house);
    placedKeys.push(key);
  }

  if (houses.length === 0) {
    throw MapGenError.placementExhausted("No enemy house could be placed", {
      buckets: [...bucketKeys],
    });
  }

  return { houses, bucketKeys: placedKeys };
}

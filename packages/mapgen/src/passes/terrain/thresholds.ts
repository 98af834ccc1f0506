/**
 * Terrain thresholds: four weights drawn from the terrain stream, rebalanced
 * so walkable ground gets a minimum share, then prefix-summed.
 */

import { MapGenError, type SeededRandom } from "@skirmish/contracts";
import { Terrain, TERRAIN_ORDER } from "../../core/grid/types";

/** Weights in Water, Mud, Grass, Tree order */
export type TerrainWeights = readonly [number, number, number, number];

/** Cumulative weights; the last entry is the total height budget */
export type TerrainThresholds = readonly [number, number, number, number];

export function drawTerrainWeights(rng: SeededRandom): TerrainWeights {
  return [rng.next(), rng.next(), rng.next(), rng.next()];
}

/**
 * Raise the Water + Mud + Grass share of the total to at least
 * `minWalkableFraction`, shrinking Tree so the total is unchanged.
 *
 * @throws {MapGenError} CONFIG_INVALID when the fraction is outside [0, 1]
 */
export function rebalanceWalkableWeights(
  weights: TerrainWeights,
  minWalkableFraction: number,
): TerrainWeights {
  if (
    !Number.isFinite(minWalkableFraction) ||
    minWalkableFraction < 0 ||
    minWalkableFraction > 1
  ) {
    throw MapGenError.configInvalid(
      `minWalkableFraction must be between 0 and 1, got ${minWalkableFraction}`,
      { minWalkableFraction },
    );
  }

  const [water, mud, grass, tree] = weights;
  const total = water + mud + grass + tree;
  if (total <= 0) return weights;

  const walkable = water + mud + grass;
  const fraction = walkable / total;
  if (fraction >= minWalkableFraction) return weights;

  const treeScale = (1 - minWalkableFraction) / (tree / total);

  // No walkable weight to scale up: split the walkable share evenly
  if (walkable === 0) {
    const share = (minWalkableFraction * total) / 3;
    return [share, share, share, tree * treeScale];
  }

  const walkableScale = minWalkableFraction / fraction;
  return [
    water * walkableScale,
    mud * walkableScale,
    grass * walkableScale,
    tree * treeScale,
  ];
}

export function toCumulativeThresholds(weights: TerrainWeights): TerrainThresholds {
  const [water, mud, grass, tree] = weights;
  const t1 = water + mud;
  const t2 = t1 + grass;
  return [water, t1, t2, t2 + tree];
}

export function totalHeight(thresholds: TerrainThresholds): number {
  return thresholds[3];
}

/**
 * First category whose cumulative threshold is ≥ `height`. Heights above
 * the last threshold fall back to TREE.
 */
export function classifyHeight(height: number, thresholds: TerrainThresholds): Terrain {
  for (let i = 0; i < thresholds.length; i++) {
    const threshold = thresholds[i];
    const terrain = TERRAIN_ORDER[i];
    if (threshold !== undefined && terrain !== undefined && height <= threshold) {
      return terrain;
    }
  }
  return Terrain.TREE;
}

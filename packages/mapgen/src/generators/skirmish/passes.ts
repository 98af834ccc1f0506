/**
 * Skirmish Map Passes
 *
 * Terrain synthesis, walkable-area extraction, bucket partitioning and
 * faction placement, in pipeline order.
 */

import { MapGenError } from "@skirmish/contracts";
import type { Dimensions } from "../../core/geometry/types";
import { findLargestWalkableRegion } from "../../core/grid/flood-fill";
import { Terrain } from "../../core/grid/types";
import { calculateMapChecksum } from "../../core/hash/checksum";
import { createHeightField } from "../../core/noise/height-field";
import { filterInterior } from "../../passes/regions/interior";
import {
  cloneBuckets,
  pickAllyHouse,
  pickEnemyHouseCount,
  placeEnemyHouses,
  selectEnemyBuckets,
} from "../../passes/placement/houses";
import { partitionIntoBuckets } from "../../passes/placement/partition";
import { placeUnitsAroundHouses } from "../../passes/placement/units";
import { synthesizeTerrain } from "../../passes/terrain/synthesize";
import {
  drawTerrainWeights,
  rebalanceWalkableWeights,
  toCumulativeThresholds,
} from "../../passes/terrain/thresholds";
import type {
  EmptyArtifact,
  Pass,
  PlacementGridArtifact,
  SkirmishMapArtifact,
  TerrainArtifact,
  WalkableAreaArtifact,
} from "../../pipeline/types";
import { MAP_HEIGHT, MAP_WIDTH } from "./constants";

const DEFAULT_DIMENSIONS: Dimensions = { width: MAP_WIDTH, height: MAP_HEIGHT };

function percent(part: number, whole: number): string {
  return whole > 0 ? `${((part / whole) * 100).toFixed(1)}%` : "0%";
}

// =============================================================================
// SYNTHESIZE TERRAIN PASS
// =============================================================================

/**
 * Draws thresholds and octave offsets from the terrain stream and classifies
 * every cell of the height field
 */
export function synthesizeTerrainPass(
  dimensions: Dimensions = DEFAULT_DIMENSIONS,
): Pass<EmptyArtifact, TerrainArtifact> {
  return {
    id: "skirmish.synthesize-terrain",
    inputType: "empty",
    outputType: "terrain",
    run(_input, ctx) {
      const { width, height } = dimensions;

      ctx.trace.decision(
        "skirmish.synthesize-terrain",
        "Map seeds",
        [],
        { terrain: ctx.seeds.terrain, locations: ctx.seeds.locations },
        `Terrain seed: ${ctx.seeds.terrain}, locations seed: ${ctx.seeds.locations}`,
      );

      const weights = rebalanceWalkableWeights(
        drawTerrainWeights(ctx.streams.terrain),
        ctx.config.minWalkableFraction,
      );
      const thresholds = toCumulativeThresholds(weights);

      const field = createHeightField(ctx.streams.terrain, ctx.streams.noise, {
        octaves: ctx.config.octaves,
        step: ctx.config.noiseStep,
      });

      const grid = synthesizeTerrain(width, height, field, thresholds);
      const total = width * height;

      ctx.trace.decision(
        "skirmish.synthesize-terrain",
        "Terrain thresholds",
        ["water", "mud", "grass", "tree"],
        thresholds,
        `Water ${percent(grid.countCells(Terrain.WATER), total)}, mud ${percent(grid.countCells(Terrain.MUD), total)}, grass ${percent(grid.countCells(Terrain.GRASS), total)}, tree ${percent(grid.countCells(Terrain.TREE), total)}`,
      );

      return {
        type: "terrain",
        id: "terrain",
        width,
        height,
        grid,
        thresholds,
      };
    },
  };
}

// =============================================================================
// FIND WALKABLE AREA PASS
// =============================================================================

/**
 * Keeps the largest walkable region and strips it to its interior
 */
export function findWalkableAreaPass(): Pass<TerrainArtifact, WalkableAreaArtifact> {
  return {
    id: "skirmish.find-walkable-area",
    inputType: "terrain",
    outputType: "walkable-area",
    run(input, ctx) {
      const region = findLargestWalkableRegion(input.grid);
      if (!region) {
        throw MapGenError.noWalkableRegion("Map has no walkable cell", {
          terrainSeed: ctx.seeds.terrain,
        });
      }

      const interior = filterInterior(input.grid, region.cells);

      ctx.trace.decision(
        "skirmish.find-walkable-area",
        "Largest walkable region",
        [],
        region.size,
        `${region.size} cells in region, ${interior.length} clear of water and trees`,
      );

      return {
        type: "walkable-area",
        id: "walkable-area",
        width: input.width,
        height: input.height,
        grid: input.grid,
        region,
        interior,
      };
    },
  };
}

// =============================================================================
// PARTITION BUCKETS PASS
// =============================================================================

/**
 * Groups interior cells into placement buckets
 */
export function partitionBucketsPass(): Pass<WalkableAreaArtifact, PlacementGridArtifact> {
  return {
    id: "skirmish.partition-buckets",
    inputType: "walkable-area",
    outputType: "placement-grid",
    run(input, ctx) {
      const { bucketWidth, bucketHeight } = ctx.config;
      const buckets = partitionIntoBuckets(
        input.grid,
        input.interior,
        bucketWidth,
        bucketHeight,
      );

      ctx.trace.decision(
        "skirmish.partition-buckets",
        "Placement buckets",
        [...buckets.keys()],
        buckets.size,
        `${buckets.size} buckets of ${bucketWidth}x${bucketHeight} tiles`,
      );

      return {
        type: "placement-grid",
        id: "placement-grid",
        width: input.width,
        height: input.height,
        grid: input.grid,
        region: input.region,
        interior: input.interior,
        buckets,
      };
    },
  };
}

// =============================================================================
// PLACE FACTIONS PASS
// =============================================================================

/**
 * Places the ally house and units, then the enemy houses and units, all from
 * the locations stream
 */
export function placeFactionsPass(): Pass<PlacementGridArtifact, SkirmishMapArtifact> {
  return {
    id: "skirmish.place-factions",
    inputType: "placement-grid",
    outputType: "skirmish-map",
    run(input, ctx) {
      const passId = "skirmish.place-factions";
      const rng = ctx.streams.locations;
      const config = ctx.config;
      const grid = input.grid;
      const buckets = cloneBuckets(input.buckets);

      // Ally
      const ally = pickAllyHouse(rng, buckets);
      ctx.trace.decision(
        passId,
        "Ally house",
        [],
        ally.house,
        `Bucket ${ally.bucketKey}, cell (${grid.indexToX(ally.house)}, ${grid.indexToY(ally.house)})`,
      );

      const allyUnits = placeUnitsAroundHouses(
        grid,
        rng,
        [ally.house],
        {
          maxUnits: config.maxAllyUnits,
          areaBudget: config.unitAreaBudget,
          allowWater: config.allowUnitsOnWater,
        },
        ctx.trace,
        passId,
      );

      // Enemies
      const enemyCount = pickEnemyHouseCount(
        rng,
        buckets.size,
        config.minEnemyHouses,
        config.maxEnemyHouses,
      );
      const enemyKeys = selectEnemyBuckets(rng, [...buckets.keys()], enemyCount);
      ctx.trace.decision(
        passId,
        "Enemy house count",
        [config.minEnemyHouses, Math.min(config.maxEnemyHouses, buckets.size)],
        enemyCount,
        `${enemyCount} of ${buckets.size} remaining buckets`,
      );

      const enemies = placeEnemyHouses(rng, grid, buckets, enemyKeys, ctx.trace, passId);

      const enemyUnits = placeUnitsAroundHouses(
        grid,
        rng,
        enemies.houses,
        {
          maxUnits: config.maxEnemyUnits,
          areaBudget: config.unitAreaBudget,
          allowWater: config.allowUnitsOnWater,
        },
        ctx.trace,
        passId,
      );

      ctx.trace.decision(
        passId,
        "Units placed",
        [],
        { ally: allyUnits.units.length, enemy: enemyUnits.units.length },
        `${allyUnits.perHouse} ally units per house, ${enemyUnits.perHouse} enemy units per house`,
      );

      const checksum = calculateMapChecksum({
        width: input.width,
        height: input.height,
        terrain: grid.getRawDataCopy(),
        allyHouse: ally.house,
        allyUnits: allyUnits.units,
        enemyHouses: enemies.houses,
        enemyUnits: enemyUnits.units,
      });

      return {
        type: "skirmish-map",
        id: "skirmish-map",
        width: input.width,
        height: input.height,
        grid,
        seeds: ctx.seeds,
        config,
        allyHouse: ally.house,
        allyBucket: ally.bucketKey,
        allyUnits: allyUnits.units,
        enemyHouses: enemies.houses,
        enemyBuckets: enemies.bucketKeys,
        enemyUnits: enemyUnits.units,
        checksum,
      };
    },
  };
}

/**
 * Unit spawn cells around houses.
 */

import { takeRandom, type SeededRandom } from "@skirmish/contracts";
import { floodFill } from "../../core/grid/flood-fill";
import type { TerrainGrid } from "../../core/grid/terrain-grid";
import { Terrain } from "../../core/grid/types";
import type { TraceCollector } from "../../pipeline/types";

const DEV_MODE = process.env.NODE_ENV !== "production";

export interface UnitPlacementOptions {
  /** Upper bound on units over all houses */
  readonly maxUnits: number;
  /** Flood fill expansions around each house */
  readonly areaBudget: number;
  readonly allowWater: boolean;
}

export interface UnitPlacement {
  readonly units: readonly number[];
  /** Units each house was asked for */
  readonly perHouse: number;
  /** Units that could not be placed for lack of candidates */
  readonly shortfall: number;
}

/**
 * Candidate cells around one house: a capped flood fill minus the house,
 * minus water when units may not start on it. Cells other houses use are
 * not excluded.
 */
export function unitCandidates(
  grid: TerrainGrid,
  house: number,
  options: UnitPlacementOptions,
): number[] {
  return floodFill(grid, house, { maxExpansions: options.areaBudget }).filter(
    (cell) =>
      cell !== house &&
      (options.allowWater || grid.getAtIndex(cell) !== Terrain.WATER),
  );
}

/**
 * Split `maxUnits` evenly over `houses` (integer division, remainder left
 * unplaced) and draw each house's units from its candidates without
 * replacement. A house short of candidates places what it can.
 */
export function placeUnitsAroundHouses(
  grid: TerrainGrid,
  rng: SeededRandom,
  houses: readonly number[],
  options: UnitPlacementOptions,
  trace: TraceCollector,
  passId: string,
): UnitPlacement {
  if (houses.length === 0) {
    return { units: [], perHouse: 0, shortfall: 0 };
  }

  const perHouse = Math.floor(options.maxUnits / houses.length);
  const units: number[] = [];
  let shortfall = 0;

  for (const house of houses) {
    const candidates = unitCandidates(grid, house, options);

    for (let placed = 0; placed < perHouse; placed++) {
      const unit = takeRandom(() => rng.next(), candidates);
      if (unit === undefined) {
        const missing = perHouse - placed;
        shortfall += missing;
        const message = `House ${house} has room for ${placed} of ${perHouse} units`;
        trace.warning(passId, message);
        if (DEV_MODE) {
          console.warn(`placeUnitsAroundHouses: ${message}`);
        }
        break;
      }
      units.push(unit);
    }
  }

  return { units, perHouse, shortfall };
}

/**
 * House and unit placement tests
 */

import { MapGenError } from "@skirmish/contracts";
import { afterEach, describe, expect, it, vi } from "vitest";
import { TerrainGrid } from "../src/core/grid";
import {
  pickAllyBucket,
  pickAllyHouse,
  pickEnemyHouseCount,
  placeEnemyHouses,
  selectEnemyBuckets,
} from "../src/passes/placement/houses";
import type { PlacementBuckets } from "../src/passes/placement/partition";
import { placeUnitsAroundHouses, unitCandidates } from "../src/passes/placement/units";
import { DefaultTraceCollector } from "../src/pipeline/trace";
import { ScriptedRandom, walledMeadow } from "./helpers";

const PASS_ID = "test.placement";

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (MapGenError.isMapGenError(error)) return error.code;
    throw error;
  }
  return undefined;
}

function warnings(trace: DefaultTraceCollector): unknown[] {
  return trace
    .getEvents()
    .filter((event) => event.eventType === "warning")
    .map((event) => event.data);
}

describe("ally placement", () => {
  it("removes the chosen bucket from the pool", () => {
    const buckets: PlacementBuckets = new Map([
      [0, [22]],
      [1, [25, 26]],
      [4, [52, 62]],
    ]);
    const picked = pickAllyBucket(new ScriptedRandom([0.5]), buckets);

    expect(picked).toEqual({ bucketKey: 1, cells: [25, 26] });
    expect([...buckets.keys()]).toEqual([0, 4]);
  });

  it("draws the house from the chosen bucket", () => {
    const buckets: PlacementBuckets = new Map([
      [0, [22]],
      [1, [25, 26]],
      [4, [52, 62]],
    ]);

    expect(pickAllyHouse(new ScriptedRandom([0.5, 0.9]), buckets)).toEqual({
      bucketKey: 1,
      house: 26,
    });
  });

  it("fails on an empty pool", () => {
    expect(errorCode(() => pickAllyBucket(new ScriptedRandom([]), new Map()))).toBe(
      "INSUFFICIENT_BUCKETS",
    );
  });
});

describe("pickEnemyHouseCount", () => {
  it("never reaches the upper bound", () => {
    expect(pickEnemyHouseCount(new ScriptedRandom([0.99]), 10, 2, 6)).toBe(5);
    expect(pickEnemyHouseCount(new ScriptedRandom([0]), 10, 2, 6)).toBe(2);
  });

  it("caps the bound at the remaining buckets", () => {
    expect(pickEnemyHouseCount(new ScriptedRandom([0.99]), 4, 2, 6)).toBe(3);
  });

  it("returns min when min equals the bound", () => {
    expect(pickEnemyHouseCount(new ScriptedRandom([0.7]), 10, 3, 3)).toBe(3);
  });

  it("fails when fewer buckets remain than the minimum", () => {
    expect(errorCode(() => pickEnemyHouseCount(new ScriptedRandom([]), 1, 2, 6))).toBe(
      "INSUFFICIENT_BUCKETS",
    );
  });
});

describe("selectEnemyBuckets", () => {
  it("removes random keys until the count remains", () => {
    expect(selectEnemyBuckets(new ScriptedRandom([0, 0.5]), [10, 20, 30, 40], 2)).toEqual([
      20, 40,
    ]);
  });

  it("keeps every key when the count allows it", () => {
    expect(selectEnemyBuckets(new ScriptedRandom([]), [10, 20], 5)).toEqual([10, 20]);
  });
});

describe("placeEnemyHouses", () => {
  it("skips a bucket without a valid house cell", () => {
    const grid = walledMeadow();
    const trace = new DefaultTraceCollector(true);
    const buckets: PlacementBuckets = new Map([
      [1, [grid.toIndex(1, 1)]],
      [5, [grid.toIndex(5, 5), grid.toIndex(6, 6)]],
    ]);

    const result = placeEnemyHouses(
      new ScriptedRandom([0, 0.5]),
      grid,
      buckets,
      [1, 5],
      trace,
      PASS_ID,
    );

    expect(result).toEqual({ houses: [66], bucketKeys: [5] });
    expect(warnings(trace)).toEqual([
      { message: "Bucket 1 has no valid house cell; skipped" },
    ]);
  });

  it("fails when no bucket yields a house", () => {
    const grid = walledMeadow();
    const buckets: PlacementBuckets = new Map([[1, [grid.toIndex(1, 1)]]]);

    expect(
      errorCode(() =>
        placeEnemyHouses(
          new ScriptedRandom([]),
          grid,
          buckets,
          [1],
          new DefaultTraceCollector(false),
          PASS_ID,
        ),
      ),
    ).toBe("PLACEMENT_EXHAUSTED");
  });
});

describe("unit placement", () => {
  const options = { maxUnits: 3, areaBudget: 4, allowWater: true };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("lists flood fill cells around the house without the house", () => {
    const grid = walledMeadow();

    expect(unitCandidates(grid, 55, options)).toEqual([54, 56, 45, 65]);
  });

  it("leaves out water when units may not start on it", () => {
    const wall = "TTTTTTTTTT";
    const row = "T........T";
    const grid = TerrainGrid.fromRows([wall, row, row, row, row, "T...~....T", row, row, row, wall]);

    expect(unitCandidates(grid, 55, { ...options, allowWater: false })).toEqual([56, 45, 65]);
    expect(unitCandidates(grid, 55, options)).toEqual([54, 56, 45, 65]);
  });

  it("draws each house's quota without replacement", () => {
    const grid = walledMeadow();
    const placement = placeUnitsAroundHouses(
      grid,
      new ScriptedRandom([]),
      [55],
      options,
      new DefaultTraceCollector(true),
      PASS_ID,
    );

    expect(placement).toEqual({ units: [54, 56, 45], perHouse: 3, shortfall: 0 });
  });

  it("splits the unit budget evenly and drops the remainder", () => {
    const grid = walledMeadow();
    const placement = placeUnitsAroundHouses(
      grid,
      new ScriptedRandom([]),
      [55, 33],
      { ...options, maxUnits: 5 },
      new DefaultTraceCollector(true),
      PASS_ID,
    );

    expect(placement).toEqual({ units: [54, 56, 32, 34], perHouse: 2, shortfall: 0 });
  });

  it("places what fits and reports the shortfall", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const grid = walledMeadow();
    const trace = new DefaultTraceCollector(true);
    const placement = placeUnitsAroundHouses(
      grid,
      new ScriptedRandom([]),
      [55],
      { ...options, maxUnits: 6 },
      trace,
      PASS_ID,
    );

    expect(placement).toEqual({ units: [54, 56, 45, 65], perHouse: 6, shortfall: 2 });
    expect(warnings(trace)).toEqual([{ message: "House 55 has room for 4 of 6 units" }]);
    expect(warn).toHaveBeenCalledWith(
      "placeUnitsAroundHouses: House 55 has room for 4 of 6 units",
    );
  });

  it("places nothing without houses", () => {
    const placement = placeUnitsAroundHouses(
      walledMeadow(),
      new ScriptedRandom([]),
      [],
      options,
      new DefaultTraceCollector(false),
      PASS_ID,
    );

    expect(placement).toEqual({ units: [], perHouse: 0, shortfall: 0 });
  });
});

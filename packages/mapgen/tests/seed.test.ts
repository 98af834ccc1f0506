import { MapGenError } from "@skirmish/contracts";
import { describe, expect, it } from "vitest";
import {
  GOOD_TERRAIN_SEEDS,
  pickGoodTerrainSeed,
  resolveSeeds,
  seedsAreEquivalent,
} from "../src/seed";

const clock = () => 0x1_2345_6789;

function seedErrorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (MapGenError.isMapGenError(error)) return error.code;
    throw error;
  }
  return undefined;
}

describe("resolveSeeds", () => {
  it("keeps non-negative seeds", () => {
    expect(resolveSeeds({ terrain: 5, locations: 0 }, clock)).toEqual({
      terrain: 5,
      locations: 0,
    });
  });

  it("substitutes a curated terrain seed for a negative one", () => {
    const seeds = resolveSeeds({ terrain: -1, locations: 3 }, clock);

    expect(GOOD_TERRAIN_SEEDS).toContain(seeds.terrain);
    expect(seeds.terrain).toBe(pickGoodTerrainSeed(clock));
    expect(seeds.locations).toBe(3);
  });

  it("derives a missing locations seed from the clock", () => {
    expect(resolveSeeds({ terrain: 1 }, clock).locations).toBe(0x2345_6789);
  });

  it("fills both seeds when none are given", () => {
    const seeds = resolveSeeds({}, clock);

    expect(GOOD_TERRAIN_SEEDS).toContain(seeds.terrain);
    expect(seeds.locations).toBe(0x2345_6789);
  });

  it("rejects non-integer and out-of-range seeds", () => {
    expect(seedErrorCode(() => resolveSeeds({ terrain: 1.5 }, clock))).toBe("SEED_INVALID");
    expect(seedErrorCode(() => resolveSeeds({ locations: 2 ** 31 }, clock))).toBe(
      "SEED_INVALID",
    );
  });
});

describe("pickGoodTerrainSeed", () => {
  it("depends only on the clock", () => {
    expect(pickGoodTerrainSeed(() => 1000)).toBe(pickGoodTerrainSeed(() => 1000));
  });
});

describe("seedsAreEquivalent", () => {
  it("compares both seeds", () => {
    expect(seedsAreEquivalent({ terrain: 1, locations: 2 }, { terrain: 1, locations: 2 })).toBe(
      true,
    );
    expect(seedsAreEquivalent({ terrain: 1, locations: 2 }, { terrain: 1, locations: 3 })).toBe(
      false,
    );
  });
});

import { describe, expect, it } from "vitest";
import { DEFAULT_MAP_GEN_CONFIG, MapGenConfigSchema } from "../src";

describe("MapGenConfigSchema", () => {
  it("accepts the default config", () => {
    const res = MapGenConfigSchema.safeParse(DEFAULT_MAP_GEN_CONFIG);
    expect(res.success).toBe(true);
  });

  it("rejects a walkable fraction above 1", () => {
    const res = MapGenConfigSchema.safeParse({
      ...DEFAULT_MAP_GEN_CONFIG,
      minWalkableFraction: 1.2,
    });
    expect(res.success).toBe(false);
  });

  it("rejects buckets too small to keep an interior", () => {
    const res = MapGenConfigSchema.safeParse({
      ...DEFAULT_MAP_GEN_CONFIG,
      bucketWidth: 2,
    });
    expect(res.success).toBe(false);
  });

  it("rejects minEnemyHouses above maxEnemyHouses", () => {
    const res = MapGenConfigSchema.safeParse({
      ...DEFAULT_MAP_GEN_CONFIG,
      minEnemyHouses: 4,
      maxEnemyHouses: 3,
    });
    expect(res.success).toBe(false);
    if (!res.success) {
      expect(res.error.issues[0]?.path).toEqual(["maxEnemyHouses"]);
    }
  });
});

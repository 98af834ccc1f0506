/**
 * SkirmishMap view and ASCII rendering tests
 */

import { describe, expect, it } from "vitest";
import { Terrain, TerrainGrid } from "../src/core/grid";
import { SkirmishMap } from "../src/map/skirmish-map";
import { describeMap, renderMapAscii } from "../src/utils";
import { makeMapArtifact } from "./helpers";

function smallMap(): SkirmishMap {
  const grid = TerrainGrid.fromRows(["TTTT", "T..T", "T.~T", "TTTT"]);
  return new SkirmishMap(
    makeMapArtifact(grid, {
      seeds: { terrain: 7, locations: 8 },
      allyHouse: 5,
      allyUnits: [6],
      enemyHouses: [9],
      enemyUnits: [10],
    }),
  );
}

describe("SkirmishMap", () => {
  it("answers terrain queries and reads outside cells as TREE", () => {
    const map = smallMap();

    expect(map.size).toBe(16);
    expect(map.terrainAt(2, 2)).toBe(Terrain.WATER);
    expect(map.terrainAt(-1, 2)).toBe(Terrain.TREE);
    expect(map.terrainAtIndex(99)).toBe(Terrain.TREE);
    expect(map.isNavigable(2, 2)).toBe(true);
    expect(map.isNavigable(0, 0)).toBe(false);
    expect(map.isNavigableIndex(5)).toBe(true);
    expect(map.indexToX(6)).toBe(2);
    expect(map.indexToY(6)).toBe(1);
  });

  it("hands out copies of its placements", () => {
    const map = smallMap();
    map.allyUnitLocations().push(99);
    map.getTerrainData()[5] = Terrain.TREE;

    expect(map.allyUnitLocations()).toEqual([6]);
    expect(map.terrainAtIndex(5)).toBe(Terrain.GRASS);
    expect(map.allyHouseLocation()).toBe(5);
    expect(map.enemyHouseLocations()).toEqual([9]);
    expect(map.enemyUnitLocations()).toEqual([10]);
  });
});

describe("renderMapAscii", () => {
  it("draws terrain only", () => {
    expect(renderMapAscii(smallMap(), { showPlacements: false })).toBe(
      "TTTT\nT..T\nT.~T\nTTTT",
    );
  });

  it("draws houses and units over the terrain", () => {
    expect(renderMapAscii(smallMap()).split("\n")).toEqual(["TTTT", "TAaT", "TEeT", "TTTT"]);
  });

  it("lets a house hide a unit on the same cell", () => {
    const grid = TerrainGrid.fromRows(["...", "..."]);
    const map = new SkirmishMap(
      makeMapArtifact(grid, { allyHouse: 0, allyUnits: [0, 1], enemyHouses: [5], enemyUnits: [5] }),
    );

    expect(renderMapAscii(map)).toBe("Aa.\n..E");
  });

  it("wraps characters in ANSI colors when asked", () => {
    const [first, second] = renderMapAscii(smallMap(), { useColors: true }).split("\n");

    expect(first).toBe("\x1b[32mT\x1b[0m".repeat(4));
    expect(second).toBe(
      "\x1b[32mT\x1b[0m\x1b[1m\x1b[36mA\x1b[0m\x1b[36ma\x1b[0m\x1b[32mT\x1b[0m",
    );
  });

  it("uses a custom charset", () => {
    const lines = renderMapAscii(smallMap(), {
      charset: { allyHouse: "H", allyUnit: "u", enemyHouse: "X", enemyUnit: "x" },
    }).split("\n");

    expect(lines[1]).toBe("THuT");
    expect(lines[2]).toBe("TXxT");
  });
});

describe("describeMap", () => {
  it("summarises seeds and placements", () => {
    const map = smallMap();

    expect(describeMap(map)).toBe(
      [
        "Seeds: terrain 7, locations 8",
        "Ally: 1 house, 1 units",
        "Enemy: 1 houses, 1 units",
        `Checksum: ${map.checksum}`,
      ].join("\n"),
    );
  });
});

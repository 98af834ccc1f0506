import { DEFAULT_MAP_GEN_CONFIG, SeededRandom } from "@skirmish/contracts";
import { TerrainGrid } from "../src/core/grid";
import { calculateMapChecksum } from "../src/core/hash";
import type { SkirmishMapArtifact } from "../src/pipeline/types";

/**
 * SeededRandom that replays fixed draws, then keeps returning 0.
 */
export class ScriptedRandom extends SeededRandom {
  private cursor = 0;

  constructor(private readonly draws: readonly number[]) {
    super(0);
  }

  override next(): number {
    const value = this.draws[this.cursor];
    this.cursor++;
    return value ?? 0;
  }
}

/**
 * 10×10 grass field ringed by trees
 */
export function walledMeadow(): TerrainGrid {
  const wall = "TTTTTTTTTT";
  const row = "T........T";
  return TerrainGrid.fromRows([wall, row, row, row, row, row, row, row, row, wall]);
}

/**
 * Hand-built finished map; the checksum is recomputed unless overridden.
 */
export function makeMapArtifact(
  grid: TerrainGrid,
  placements: Partial<Omit<SkirmishMapArtifact, "type" | "id" | "grid">> = {},
): SkirmishMapArtifact {
  const allyHouse = placements.allyHouse ?? 0;
  const allyUnits = placements.allyUnits ?? [];
  const enemyHouses = placements.enemyHouses ?? [];
  const enemyUnits = placements.enemyUnits ?? [];

  return {
    type: "skirmish-map",
    id: "skirmish-map",
    width: grid.width,
    height: grid.height,
    grid,
    seeds: placements.seeds ?? { terrain: 1, locations: 2 },
    config: placements.config ?? DEFAULT_MAP_GEN_CONFIG,
    allyHouse,
    allyBucket: placements.allyBucket ?? 0,
    allyUnits,
    enemyHouses,
    enemyBuckets: placements.enemyBuckets ?? [],
    enemyUnits,
    checksum:
      placements.checksum ??
      calculateMapChecksum({
        width: grid.width,
        height: grid.height,
        terrain: grid.getRawDataCopy(),
        allyHouse,
        allyUnits,
        enemyHouses,
        enemyUnits,
      }),
  };
}

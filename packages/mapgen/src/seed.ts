/**
 * Seed resolution
 *
 * A missing or negative seed is replaced before generation: the terrain seed
 * by one of the curated seeds below, the locations seed by the clock.
 */

import {
  MapGenError,
  type MapSeedInput,
  MapSeedInputSchema,
  type MapSeeds,
  MapSeedsSchema,
  SeededRandom,
  timeDerivedSeed,
} from "@skirmish/contracts";

/**
 * Terrain seeds picked when the caller gives none
 */
export const GOOD_TERRAIN_SEEDS: readonly [number, ...number[]] = [
  414038828, 414234828, 414292109, 414329078, 414372453,
  414408968, 414431718, 414471953, 414531718, 414585343,
  414622921, 414698703, 414746015, 414787531, 414842390,
  415004875, 415155421, 415202375, 415224078, 415383609,
  415407578, 415431671, 415507984, 415533187,
];

/**
 * Pick a curated terrain seed with a clock-seeded generator.
 */
export function pickGoodTerrainSeed(clock: () => number = Date.now): number {
  const selector = new SeededRandom(timeDerivedSeed(clock));
  return GOOD_TERRAIN_SEEDS[selector.nextInt(GOOD_TERRAIN_SEEDS.length)] ?? GOOD_TERRAIN_SEEDS[0];
}

/**
 * Replace missing or negative seeds and validate the result.
 *
 * @throws {MapGenError} SEED_INVALID for non-integer or out-of-range input
 */
export function resolveSeeds(
  input: MapSeedInput = {},
  clock: () => number = Date.now,
): MapSeeds {
  const parsedInput = MapSeedInputSchema.safeParse(input);
  if (!parsedInput.success) {
    throw MapGenError.seedInvalid(
      `Invalid seeds: ${parsedInput.error.issues.map((issue) => issue.message).join("; ")}`,
      { input: { terrain: input.terrain, locations: input.locations } },
    );
  }

  const { terrain, locations } = parsedInput.data;
  const resolved = {
    terrain: terrain !== undefined && terrain >= 0 ? terrain : pickGoodTerrainSeed(clock),
    locations: locations !== undefined && locations >= 0 ? locations : timeDerivedSeed(clock),
  };

  const parsed = MapSeedsSchema.safeParse(resolved);
  if (!parsed.success) {
    throw MapGenError.seedInvalid("Resolved seeds are out of range", { resolved });
  }
  return parsed.data;
}

/**
 * Check if two seed pairs will produce identical maps
 */
export function seedsAreEquivalent(a: MapSeeds, b: MapSeeds): boolean {
  return a.terrain === b.terrain && a.locations === b.locations;
}

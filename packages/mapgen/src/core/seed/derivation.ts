import { type MapSeeds, SeededRandom } from "@skirmish/contracts";

/**
 * Seeds for the independent RNG streams of one generation run.
 */
export interface StreamSeeds {
  /** Threshold weights and octave offsets */
  readonly terrain: number;
  /** Permutation table of the noise function */
  readonly noise: number;
  /** Buckets, houses and units */
  readonly locations: number;
}

/**
 * Derive per-stream seeds from the two map seeds.
 *
 * The noise seed comes from the terrain seed alone, so terrain never depends
 * on the locations seed.
 */
export function deriveStreamSeeds(seeds: MapSeeds): StreamSeeds {
  const terrain = seeds.terrain >>> 0;
  const mixer = new SeededRandom(terrain ^ 0x5bd1e995);

  return {
    terrain,
    noise: Math.floor(mixer.next() * 0xffffffff),
    locations: seeds.locations >>> 0,
  };
}

/**
 * Generation API
 *
 * High-level entry points for skirmish map generation.
 */

import {
  buildMapGenConfig,
  type MapGenConfig,
  MapGenError,
  type MapSeeds,
} from "@skirmish/contracts";
import { createSkirmishGenerator } from "./generators/skirmish";
import { SkirmishMap } from "./map/skirmish-map";
import {
  createEmptyArtifact,
  type PipelineOptions,
  type PipelineResult,
  type SkirmishMapArtifact,
} from "./pipeline/types";
import { resolveSeeds } from "./seed";

export interface SkirmishMapInput {
  /** Missing or negative: pick a curated terrain seed */
  readonly terrainSeed?: number;
  /** Missing or negative: derive from the clock */
  readonly locationsSeed?: number;
  readonly config?: Partial<MapGenConfig>;
  /** Clock used for seed substitution */
  readonly clock?: () => number;
}

const generator = createSkirmishGenerator();

function failure(error: MapGenError): PipelineResult<SkirmishMapArtifact> {
  return { success: false, error, trace: [], durationMs: 0 };
}

/**
 * Resolve seeds and config, then run the skirmish pipeline.
 * Never throws: configuration and seed errors come back as a failed result.
 *
 * @example
 * ```typescript
 * const result = generateMap({ terrainSeed: 414038828, locationsSeed: 7 });
 * if (result.success) {
 *   console.log(result.artifact.checksum);
 * }
 * ```
 */
export function generateMap(
  input: SkirmishMapInput = {},
  options: PipelineOptions = {},
): PipelineResult<SkirmishMapArtifact> {
  const config = buildMapGenConfig(input.config);
  if (config.isErr()) {
    return failure(config.error);
  }

  let seeds: MapSeeds;
  try {
    seeds = resolveSeeds(
      { terrain: input.terrainSeed, locations: input.locationsSeed },
      input.clock,
    );
  } catch (error) {
    if (MapGenError.isMapGenError(error)) return failure(error);
    throw error;
  }

  return generator
    .createPipeline(config.value)
    .runSync(createEmptyArtifact(), seeds, options);
}

/**
 * Generate a map or throw.
 *
 * @throws {MapGenError} When configuration, seeds or generation fail
 */
export function createSkirmishMap(input: SkirmishMapInput = {}): SkirmishMap {
  const result = generateMap(input);
  if (!result.success) {
    throw result.error;
  }
  return new SkirmishMap(result.artifact);
}

/**
 * Skirmish Map Generator
 *
 * Noise terrain with one ally base and several enemy bases spread over the
 * largest walkable area.
 */

import type { MapGenConfig } from "@skirmish/contracts";
import { PipelineBuilder } from "../../pipeline/builder";
import type {
  EmptyArtifact,
  Generator,
  Pipeline,
  SkirmishMapArtifact,
} from "../../pipeline/types";
import {
  findWalkableAreaPass,
  partitionBucketsPass,
  placeFactionsPass,
  synthesizeTerrainPass,
} from "./passes";

export class SkirmishGenerator implements Generator {
  readonly id = "skirmish";
  readonly name = "Skirmish";
  readonly description =
    "Noise terrain with an ally base and enemy bases placed in separate buckets";

  createPipeline(config: MapGenConfig): Pipeline<EmptyArtifact, SkirmishMapArtifact> {
    return PipelineBuilder.create<EmptyArtifact>("skirmish-pipeline", config)
      .pipe(synthesizeTerrainPass())
      .pipe(findWalkableAreaPass())
      .pipe(partitionBucketsPass())
      .pipe(placeFactionsPass())
      .build();
  }
}

export function createSkirmishGenerator(): SkirmishGenerator {
  return new SkirmishGenerator();
}

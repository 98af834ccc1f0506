/**
 * Pipeline types: artifacts flowing between passes, pass context, results.
 */

import type { MapGenConfig, MapGenError, MapSeeds, SeededRandom } from "@skirmish/contracts";
import type { TerrainGrid } from "../core/grid/terrain-grid";
import type { Region } from "../core/grid/types";
import type { TerrainThresholds } from "../passes/terrain/thresholds";

// =============================================================================
// ARTIFACTS
// =============================================================================

/**
 * Base artifact interface. All artifacts have a type discriminant and an id.
 */
export interface Artifact<T extends string = string> {
  readonly type: T;
  readonly id: string;
}

/**
 * Starting point for pipelines
 */
export interface EmptyArtifact extends Artifact<"empty"> {
  readonly type: "empty";
}

/**
 * Classified terrain
 */
export interface TerrainArtifact extends Artifact<"terrain"> {
  readonly type: "terrain";
  readonly width: number;
  readonly height: number;
  readonly grid: TerrainGrid;
  readonly thresholds: TerrainThresholds;
}

/**
 * Largest walkable region and the part of it a house can stand on
 */
export interface WalkableAreaArtifact extends Artifact<"walkable-area"> {
  readonly type: "walkable-area";
  readonly width: number;
  readonly height: number;
  readonly grid: TerrainGrid;
  readonly region: Region;
  readonly interior: readonly number[];
}

/**
 * Interior cells grouped into placement buckets
 */
export interface PlacementGridArtifact extends Artifact<"placement-grid"> {
  readonly type: "placement-grid";
  readonly width: number;
  readonly height: number;
  readonly grid: TerrainGrid;
  readonly region: Region;
  readonly interior: readonly number[];
  readonly buckets: ReadonlyMap<number, readonly number[]>;
}

/**
 * Finished map: terrain plus faction placement
 */
export interface SkirmishMapArtifact extends Artifact<"skirmish-map"> {
  readonly type: "skirmish-map";
  readonly width: number;
  readonly height: number;
  readonly grid: TerrainGrid;
  readonly seeds: MapSeeds;
  readonly config: MapGenConfig;
  readonly allyHouse: number;
  readonly allyBucket: number;
  readonly allyUnits: readonly number[];
  readonly enemyHouses: readonly number[];
  readonly enemyBuckets: readonly number[];
  readonly enemyUnits: readonly number[];
  readonly checksum: string;
}

/**
 * Validation violation
 */
export interface Violation {
  readonly type: string;
  readonly message: string;
  readonly severity: "error" | "warning";
}

// =============================================================================
// TRACE
// =============================================================================

export type TraceEventType = "start" | "end" | "decision" | "artifact" | "warning";

export interface TraceEvent {
  readonly timestamp: number;
  readonly passId: string;
  readonly eventType: TraceEventType;
  readonly data?: unknown;
}

export interface TraceCollector {
  readonly enabled: boolean;
  start(passId: string): void;
  end(passId: string, durationMs: number): void;
  decision(
    passId: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void;
  warning(passId: string, message: string): void;
  artifact(passId: string, artifact: Artifact): void;
  getEvents(): readonly TraceEvent[];
  getEventsForPass(passId: string): readonly TraceEvent[];
  clear(): void;
}

// =============================================================================
// CONTEXT & PASSES
// =============================================================================

/**
 * Independent random streams. Each stream is consumed in a fixed order by a
 * fixed set of passes; a pass must draw the same number of values on every
 * branch it can take.
 */
export interface RNGStreams {
  /** Threshold weights, octave offsets */
  readonly terrain: SeededRandom;
  /** Noise permutation table */
  readonly noise: SeededRandom;
  /** Buckets, houses, units */
  readonly locations: SeededRandom;
}

export interface PassContext {
  readonly streams: RNGStreams;
  readonly config: MapGenConfig;
  readonly trace: TraceCollector;
  readonly seeds: MapSeeds;
}

/**
 * A pass transforms one artifact type into another.
 */
export interface Pass<TIn extends Artifact, TOut extends Artifact> {
  readonly id: string;
  readonly inputType: TIn["type"];
  readonly outputType: TOut["type"];
  run(input: TIn, ctx: PassContext): TOut;
}

// =============================================================================
// PIPELINE
// =============================================================================

/**
 * Lightweight per-pass metrics
 */
export interface PassMetrics {
  readonly passId: string;
  readonly passIndex: number;
  readonly durationMs: number;
  readonly artifactType: string;
}

export type PassMetricsCallback = (metrics: PassMetrics) => void;

/**
 * Progress callback (percent, passId)
 */
export type ProgressCallback = (progress: number, passId: string) => void;

export interface PipelineOptions {
  readonly onProgress?: ProgressCallback;
  readonly onPassMetrics?: PassMetricsCallback;
}

export interface PipelineSuccess<T extends Artifact> {
  readonly success: true;
  readonly artifact: T;
  readonly trace: readonly TraceEvent[];
  readonly durationMs: number;
}

export interface PipelineFailure {
  readonly success: false;
  readonly error: MapGenError;
  readonly trace: readonly TraceEvent[];
  readonly durationMs: number;
}

/**
 * Pipeline execution result. Discriminated union - use `if (result.success)`
 * to narrow.
 */
export type PipelineResult<T extends Artifact> = PipelineSuccess<T> | PipelineFailure;

export interface Pipeline<TStart extends Artifact, TEnd extends Artifact> {
  readonly id: string;
  readonly passIds: readonly string[];
  runSync(input: TStart, seeds: MapSeeds, options?: PipelineOptions): PipelineResult<TEnd>;
}

/**
 * Generator interface - creates pipelines for one map style
 */
export interface Generator {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  createPipeline(config: MapGenConfig): Pipeline<EmptyArtifact, SkirmishMapArtifact>;
}

export function createEmptyArtifact(): EmptyArtifact {
  return { type: "empty", id: "empty" };
}

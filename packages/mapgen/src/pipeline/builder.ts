/**
 * Type-safe pipeline builder DSL.
 *
 * Passes are composed into a single chain at build time, so the compiler
 * checks that each pass accepts the artifact the previous one produces.
 */

import {
  type MapGenConfig,
  MapGenError,
  type MapSeeds,
  SeededRandom,
} from "@skirmish/contracts";
import { deriveStreamSeeds } from "../core/seed/derivation";
import { createTraceCollector } from "./trace";
import type {
  Artifact,
  Pass,
  PassContext,
  Pipeline,
  PipelineOptions,
  PipelineResult,
  RNGStreams,
  TraceCollector,
} from "./types";

/**
 * Runs one pass with tracing and callbacks around it
 */
type StepRunner = <TIn extends Artifact, TOut extends Artifact>(
  pass: Pass<TIn, TOut>,
  input: TIn,
) => TOut;

type Chain<TStart extends Artifact, TCurrent extends Artifact> = (
  input: TStart,
  runStep: StepRunner,
) => TCurrent;

/**
 * Create RNG streams from seeds - each stage gets isolated randomness
 */
export function createRNGStreams(seeds: MapSeeds): RNGStreams {
  const derived = deriveStreamSeeds(seeds);
  return {
    terrain: new SeededRandom(derived.terrain),
    noise: new SeededRandom(derived.noise),
    locations: new SeededRandom(derived.locations),
  };
}

/**
 * Keep MapGenErrors as they are; wrap anything else as GENERATION_FAILED
 * naming the pass that threw.
 */
function toMapGenError(
  error: unknown,
  passId: string | undefined,
  passIndex: number,
): MapGenError {
  if (MapGenError.isMapGenError(error)) return error;

  const message = error instanceof Error ? error.message : String(error);
  const wrapped = MapGenError.generationFailed(
    `Pipeline failed at step ${passIndex} (pass: ${passId ?? "unknown"}): ${message}`,
    { passId, passIndex },
  );
  wrapped.cause = error;
  return wrapped;
}

function runPipelineSync<TStart extends Artifact, TCurrent extends Artifact>(
  chain: Chain<TStart, TCurrent>,
  totalSteps: number,
  input: TStart,
  seeds: MapSeeds,
  config: MapGenConfig,
  options: PipelineOptions = {},
): PipelineResult<TCurrent> {
  const startTime = performance.now();
  const trace: TraceCollector = createTraceCollector(config.trace);
  const ctx: PassContext = {
    streams: createRNGStreams(seeds),
    config,
    trace,
    seeds,
  };

  const cursor: { passIndex: number; passId?: string } = { passIndex: 0 };

  const runStep: StepRunner = (pass, stepInput) => {
    cursor.passId = pass.id;
    trace.start(pass.id);
    const stepStart = performance.now();

    const output = pass.run(stepInput, ctx);

    const durationMs = performance.now() - stepStart;
    trace.end(pass.id, durationMs);
    trace.artifact(pass.id, output);

    options.onPassMetrics?.({
      passId: pass.id,
      passIndex: cursor.passIndex,
      durationMs,
      artifactType: output.type,
    });
    options.onProgress?.(
      Math.round(((cursor.passIndex + 1) / totalSteps) * 100),
      pass.id,
    );

    cursor.passIndex++;
    return output;
  };

  try {
    const artifact = chain(input, runStep);
    return {
      success: true,
      artifact,
      trace: trace.getEvents(),
      durationMs: performance.now() - startTime,
    };
  } catch (error) {
    const mapped = toMapGenError(error, cursor.passId, cursor.passIndex);
    trace.warning(cursor.passId ?? "pipeline", `${mapped.code}: ${mapped.message}`);
    return {
      success: false,
      error: mapped,
      trace: trace.getEvents(),
      durationMs: performance.now() - startTime,
    };
  }
}

/**
 * Pipeline builder for composing passes.
 *
 * Type parameters:
 * - TStart: The input artifact type for the pipeline
 * - TCurrent: The current output artifact type (evolves as passes are added)
 */
export class PipelineBuilder<TStart extends Artifact, TCurrent extends Artifact> {
  private constructor(
    private readonly id: string,
    private readonly config: MapGenConfig,
    private readonly passIds: readonly string[],
    private readonly chain: Chain<TStart, TCurrent>,
  ) {}

  static create<TStart extends Artifact>(
    id: string,
    config: MapGenConfig,
  ): PipelineBuilder<TStart, TStart> {
    return new PipelineBuilder<TStart, TStart>(id, config, [], (input) => input);
  }

  /**
   * Append a pass whose input is the current output type
   */
  pipe<TNext extends Artifact>(pass: Pass<TCurrent, TNext>): PipelineBuilder<TStart, TNext> {
    const previous = this.chain;
    return new PipelineBuilder<TStart, TNext>(
      this.id,
      this.config,
      [...this.passIds, pass.id],
      (input, runStep) => runStep(pass, previous(input, runStep)),
    );
  }

  build(): Pipeline<TStart, TCurrent> {
    const { id, config, chain } = this;
    const passIds = [...this.passIds];

    return {
      id,
      passIds,
      runSync(input, seeds, options) {
        return runPipelineSync(chain, passIds.length, input, seeds, config, options);
      },
    };
  }
}

export function createPipeline<TStart extends Artifact>(
  id: string,
  config: MapGenConfig,
): PipelineBuilder<TStart, TStart> {
  return PipelineBuilder.create<TStart>(id, config);
}

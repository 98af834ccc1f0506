/**
 * Error codes for map generation.
 */
export type MapGenErrorCode =
  | "CONFIG_INVALID"
  | "SEED_INVALID"
  | "NO_WALKABLE_REGION"
  | "INSUFFICIENT_BUCKETS"
  | "PLACEMENT_EXHAUSTED"
  | "GENERATION_FAILED";

/**
 * Unified error type for all map generation failures.
 *
 * Configuration errors are raised before anything is generated; the other
 * codes abort generation without publishing a partial map.
 *
 * @example
 * ```typescript
 * throw MapGenError.placementExhausted("Bucket 12 has no house cell", {
 *   bucket: 12,
 * });
 * ```
 */
export class MapGenError extends Error {
  readonly name = "MapGenError";

  constructor(
    public readonly code: MapGenErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MapGenError);
    }
  }

  static configInvalid(message: string, details?: Record<string, unknown>): MapGenError {
    return new MapGenError("CONFIG_INVALID", message, details);
  }

  static seedInvalid(message: string, details?: Record<string, unknown>): MapGenError {
    return new MapGenError("SEED_INVALID", message, details);
  }

  static noWalkableRegion(message: string, details?: Record<string, unknown>): MapGenError {
    return new MapGenError("NO_WALKABLE_REGION", message, details);
  }

  static insufficientBuckets(message: string, details?: Record<string, unknown>): MapGenError {
    return new MapGenError("INSUFFICIENT_BUCKETS", message, details);
  }

  static placementExhausted(message: string, details?: Record<string, unknown>): MapGenError {
    return new MapGenError("PLACEMENT_EXHAUSTED", message, details);
  }

  static generationFailed(message: string, details?: Record<string, unknown>): MapGenError {
    return new MapGenError("GENERATION_FAILED", message, details);
  }

  static isMapGenError(error: unknown): error is MapGenError {
    return error instanceof MapGenError;
  }

  toJSON(): {
    name: string;
    code: MapGenErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

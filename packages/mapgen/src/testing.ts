/**
 * Testing utilities for map generation.
 * Kept apart from validation so validation does not import the API.
 */

import { generateMap, type SkirmishMapInput } from "./api";

/**
 * Error thrown when determinism assertion fails
 */
export class DeterminismViolationError extends Error {
  constructor(
    public readonly checksums: string[],
    public readonly input: SkirmishMapInput,
  ) {
    super(
      `Non-deterministic generation detected: produced ${checksums.length} different checksums for the same seeds`,
    );
    this.name = "DeterminismViolationError";
  }
}

/**
 * Generate the same map `runs` times and require identical checksums.
 * Pass explicit seeds: substituted seeds depend on the clock.
 *
 * @throws {DeterminismViolationError} If runs disagree
 */
export function assertDeterministic(input: SkirmishMapInput, runs: number = 3): void {
  const checksums: string[] = [];

  for (let i = 0; i < runs; i++) {
    const result = generateMap(input);
    if (!result.success) {
      throw new Error(`Generation failed on run ${i + 1}: ${result.error.message}`);
    }
    checksums.push(result.artifact.checksum);
  }

  const uniqueChecksums = [...new Set(checksums)];
  if (uniqueChecksums.length > 1) {
    throw new DeterminismViolationError(uniqueChecksums, input);
  }
}

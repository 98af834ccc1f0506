/**
 * Multi-octave height field over 2D simplex noise.
 */

import type { SeededRandom } from "@skirmish/contracts";
import { createNoise2D, type NoiseFunction2D } from "simplex-noise";

/**
 * Octave offset slots drawn from the terrain stream, whatever the configured
 * octave count. Keeps the draw order stable when `octaves` changes.
 */
export const MAX_OCTAVES = 4;

/** Offsets are drawn in [0, OFFSET_RANGE) */
const OFFSET_RANGE = 255;

export interface HeightFieldOptions {
  readonly octaves: number;
  /** Noise-space distance between neighbouring cells */
  readonly step: number;
}

export interface HeightField {
  readonly octaves: number;
  readonly offsetsX: readonly number[];
  readonly offsetsY: readonly number[];
  /**
   * Raw height at a cell: `Σ noise(sx + step·x·2^o, sy + step·y·2^o) / 2^o`.
   * Each octave contributes a value in [-1, 1] scaled by 1 / 2^o.
   */
  sample(x: number, y: number): number;
}

/**
 * Build a height field.
 *
 * Draws MAX_OCTAVES x-offsets, then MAX_OCTAVES y-offsets from `terrainRng`
 * and seeds the noise permutation from `noiseRng`.
 */
export function createHeightField(
  terrainRng: SeededRandom,
  noiseRng: SeededRandom,
  options: HeightFieldOptions,
): HeightField {
  const offsetsX: number[] = [];
  const offsetsY: number[] = [];
  for (let i = 0; i < MAX_OCTAVES; i++) {
    offsetsX.push(terrainRng.next() * OFFSET_RANGE);
  }
  for (let i = 0; i < MAX_OCTAVES; i++) {
    offsetsY.push(terrainRng.next() * OFFSET_RANGE);
  }

  const noise: NoiseFunction2D = createNoise2D(() => noiseRng.next());
  const octaves = Math.min(Math.max(1, Math.floor(options.octaves)), MAX_OCTAVES);
  const { step } = options;

  return {
    octaves,
    offsetsX,
    offsetsY,
    sample(x: number, y: number): number {
      let height = 0;
      let frequency = 1;
      for (let o = 0; o < octaves; o++) {
        const sx = offsetsX[o] ?? 0;
        const sy = offsetsY[o] ?? 0;
        height += noise(sx + step * x * frequency, sy + step * y * frequency) / frequency;
        frequency *= 2;
      }
      return height;
    },
  };
}

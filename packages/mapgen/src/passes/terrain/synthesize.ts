import type { HeightField } from "../../core/noise/height-field";
import { TerrainGrid } from "../../core/grid/terrain-grid";
import { classifyHeight, type TerrainThresholds, totalHeight } from "./thresholds";

/**
 * Classify every cell of a `width × height` grid, row by row.
 *
 * Raw heights are scaled by the threshold total and clamped to it; there is
 * no global rescale, so octave overshoot piles up in the top category.
 */
export function synthesizeTerrain(
  width: number,
  height: number,
  field: HeightField,
  thresholds: TerrainThresholds,
): TerrainGrid {
  const total = totalHeight(thresholds);
  const data = new Uint8Array(width * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const scaled = Math.min(field.sample(x, y) * total, total);
      data[x + y * width] = classifyHeight(scaled, thresholds);
    }
  }

  return TerrainGrid.fromData(width, height, data);
}

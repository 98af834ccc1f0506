/**
 * ASCII Map Renderer
 *
 * Renders skirmish maps as text for previews and debugging.
 *
 * @example
 * ```typescript
 * const map = createSkirmishMap({ terrainSeed: 414038828, locationsSeed: 7 });
 * console.log(renderMapAscii(map));
 * ```
 */

import { TERRAIN_CHARS } from "../core/grid/terrain-grid";
import type { SkirmishMap } from "../map/skirmish-map";

/**
 * Characters for placements. Terrain uses the `~ , . T` legend.
 */
export interface PlacementCharset {
  readonly allyHouse: string;
  readonly allyUnit: string;
  readonly enemyHouse: string;
  readonly enemyUnit: string;
}

export const DEFAULT_PLACEMENT_CHARSET: PlacementCharset = {
  allyHouse: "A",
  allyUnit: "a",
  enemyHouse: "E",
  enemyUnit: "e",
};

export interface RenderOptions {
  readonly charset?: PlacementCharset;
  /** Draw houses and units over the terrain */
  readonly showPlacements?: boolean;
  /** Color output (ANSI escape codes) */
  readonly useColors?: boolean;
}

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
} as const;

function colorize(text: string, ...codes: string[]): string {
  return codes.join("") + text + ANSI.reset;
}

const TERRAIN_COLORS: readonly string[] = [ANSI.blue, ANSI.yellow, ANSI.green, ANSI.green];

/**
 * One line per row, one character per cell. Units are drawn before houses,
 * so a house hides a unit on the same cell.
 */
export function renderMapAscii(map: SkirmishMap, options: RenderOptions = {}): string {
  const {
    charset = DEFAULT_PLACEMENT_CHARSET,
    showPlacements = true,
    useColors = false,
  } = options;

  const cells: string[] = [];
  for (let index = 0; index < map.size; index++) {
    const terrain = map.terrainAtIndex(index);
    const char = TERRAIN_CHARS[terrain];
    cells.push(useColors ? colorize(char, TERRAIN_COLORS[terrain] ?? "") : char);
  }

  if (showPlacements) {
    const mark = (index: number, char: string, ...codes: string[]): void => {
      if (index < 0 || index >= cells.length) return;
      cells[index] = useColors ? colorize(char, ...codes) : char;
    };

    for (const unit of map.allyUnitLocations()) mark(unit, charset.allyUnit, ANSI.cyan);
    for (const unit of map.enemyUnitLocations()) mark(unit, charset.enemyUnit, ANSI.red);
    mark(map.allyHouseLocation(), charset.allyHouse, ANSI.bold, ANSI.cyan);
    for (const house of map.enemyHouseLocations()) {
      mark(house, charset.enemyHouse, ANSI.bold, ANSI.red);
    }
  }

  const lines: string[] = [];
  for (let y = 0; y < map.height; y++) {
    lines.push(cells.slice(y * map.width, (y + 1) * map.width).join(""));
  }
  return lines.join("\n");
}

/**
 * Counts shown under a preview
 */
export function describeMap(map: SkirmishMap): string {
  return [
    `Seeds: terrain ${map.seeds.terrain}, locations ${map.seeds.locations}`,
    `Ally: 1 house, ${map.allyUnitLocations().length} units`,
    `Enemy: ${map.enemyHouseLocations().length} houses, ${map.enemyUnitLocations().length} units`,
    `Checksum: ${map.checksum}`,
  ].join("\n");
}

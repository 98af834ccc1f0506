/**
 * Skirmish map generation
 *
 * Deterministic terrain and starting placements for an ally faction and an
 * enemy faction.
 *
 * @example
 * ```typescript
 * import { createSkirmishMap } from "@skirmish/mapgen";
 *
 * const map = createSkirmishMap({ terrainSeed: 414038828, locationsSeed: 7 });
 * map.isNavigable(10, 10);
 * map.enemyHouseLocations();
 * ```
 */

export * from "./api";
export * from "./core";
export * from "./generators/skirmish";
export { SkirmishMap } from "./map/skirmish-map";
export * from "./passes/placement/houses";
export * from "./passes/placement/partition";
export * from "./passes/placement/units";
export * from "./passes/regions/interior";
export * from "./passes/terrain/synthesize";
export * from "./passes/terrain/thresholds";
export * from "./pipeline";
export * from "./seed";
export * from "./testing";
export * from "./utils";
export * from "./validation";

/**
 * Grid module - terrain grid and connectivity.
 */

export * from "./flood-fill";
export { TERRAIN_CHARS, TerrainGrid } from "./terrain-grid";
export * from "./types";

/**
 * Read-only view of a generated map, handed to rendering, steering and
 * pathfinding code.
 */

import type { MapSeeds } from "@skirmish/contracts";
import type { TerrainGrid } from "../core/grid/terrain-grid";
import type { Terrain } from "../core/grid/types";
import type { SkirmishMapArtifact } from "../pipeline/types";

export class SkirmishMap {
  readonly width: number;
  readonly height: number;
  readonly seeds: MapSeeds;
  readonly checksum: string;

  private readonly grid: TerrainGrid;
  private readonly allyHouse: number;
  private readonly allyUnits: readonly number[];
  private readonly enemyHouses: readonly number[];
  private readonly enemyUnits: readonly number[];

  constructor(artifact: SkirmishMapArtifact) {
    this.width = artifact.width;
    this.height = artifact.height;
    this.seeds = { terrain: artifact.seeds.terrain, locations: artifact.seeds.locations };
    this.checksum = artifact.checksum;
    this.grid = artifact.grid;
    this.allyHouse = artifact.allyHouse;
    this.allyUnits = [...artifact.allyUnits];
    this.enemyHouses = [...artifact.enemyHouses];
    this.enemyUnits = [...artifact.enemyUnits];
  }

  get size(): number {
    return this.width * this.height;
  }

  toIndex(x: number, y: number): number {
    return this.grid.toIndex(x, y);
  }

  indexToX(index: number): number {
    return this.grid.indexToX(index);
  }

  indexToY(index: number): number {
    return this.grid.indexToY(index);
  }

  /**
   * Terrain at (x, y); TREE outside the map
   */
  terrainAt(x: number, y: number): Terrain {
    return this.grid.get(x, y);
  }

  /**
   * Terrain at a linear index; TREE outside the map
   */
  terrainAtIndex(index: number): Terrain {
    return this.grid.getAtIndex(index);
  }

  /**
   * Whether (x, y) can be walked on; false outside the map
   */
  isNavigable(x: number, y: number): boolean {
    return this.grid.isNavigable(x, y);
  }

  isNavigableIndex(index: number): boolean {
    return this.grid.isNavigableIndex(index);
  }

  /**
   * Copy of the terrain bytes, row-major
   */
  getTerrainData(): Uint8Array {
    return this.grid.getRawDataCopy();
  }

  allyHouseLocation(): number {
    return this.allyHouse;
  }

  allyUnitLocations(): number[] {
    return [...this.allyUnits];
  }

  enemyHouseLocations(): number[] {
    return [...this.enemyHouses];
  }

  enemyUnitLocations(): number[] {
    return [...this.enemyUnits];
  }
}

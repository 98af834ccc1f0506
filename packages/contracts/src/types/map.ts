/**
 * Seeds a map is generated from. Both are non-negative int32 values.
 */
export interface MapSeeds {
  readonly terrain: number;
  readonly locations: number;
}

/**
 * Seeds as supplied by a caller. A missing or negative value asks the
 * generator to substitute one.
 */
export interface MapSeedInput {
  readonly terrain?: number;
  readonly locations?: number;
}

export interface MapGenConfig {
  /** Minimum share of the height budget given to Water + Mud + Grass */
  readonly minWalkableFraction: number;
  /** Noise octaves summed into the height field (1-4) */
  readonly octaves: number;
  /** Noise-space distance between neighbouring cells */
  readonly noiseStep: number;
  readonly bucketWidth: number;
  readonly bucketHeight: number;
  readonly maxAllyUnits: number;
  readonly maxEnemyUnits: number;
  /** Flood-fill expansions around each house when looking for unit cells */
  readonly unitAreaBudget: number;
  readonly minEnemyHouses: number;
  readonly maxEnemyHouses: number;
  readonly allowUnitsOnWater: boolean;
  readonly trace: boolean;
}

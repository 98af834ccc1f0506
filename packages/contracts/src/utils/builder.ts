import { MapGenConfigSchema } from "../schemas/config";
import { MapGenError } from "../types/error";
import type { MapGenConfig } from "../types/map";
import { Err, Ok, type Result } from "../types/result";

export const DEFAULT_MAP_GEN_CONFIG: MapGenConfig = {
  minWalkableFraction: 0.7,
  octaves: 2,
  noiseStep: 0.05,
  bucketWidth: 5,
  bucketHeight: 5,
  maxAllyUnits: 15,
  maxEnemyUnits: 25,
  unitAreaBudget: 8 + 16 + 24,
  minEnemyHouses: 2,
  maxEnemyHouses: 6,
  allowUnitsOnWater: true,
  trace: false,
};

/**
 * Fill in defaults and validate. Nothing is clamped: an out-of-range value
 * is a configuration error.
 */
export function buildMapGenConfig(
  input: Partial<MapGenConfig> = {},
): Result<MapGenConfig, MapGenError> {
  const candidate: MapGenConfig = { ...DEFAULT_MAP_GEN_CONFIG, ...input };

  const parsed = MapGenConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    return Err(
      MapGenError.configInvalid(
        `Invalid map generation config: ${issues
          .map((issue) => `${issue.path}: ${issue.message}`)
          .join("; ")}`,
        { issues },
      ),
    );
  }
  return Ok(parsed.data);
}

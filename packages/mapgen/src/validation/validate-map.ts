import { chebyshevDistance } from "../core/geometry/types";
import { calculateMapChecksum } from "../core/hash/checksum";
import { bucketKeyOf } from "../passes/placement/partition";
import { hasHazardFreeNeighbourhood } from "../passes/regions/interior";
import type { SkirmishMapArtifact, Violation } from "../pipeline/types";

export interface ValidationSuccess {
  readonly success: true;
  readonly violations: readonly Violation[];
}

export interface ValidationFailure {
  readonly success: false;
  readonly violations: readonly Violation[];
}

/**
 * Map validation result - discriminated union.
 * Use `if (result.success)` to narrow.
 */
export type MapValidationResult = ValidationSuccess | ValidationFailure;

export function hasErrorViolations(violations: readonly Violation[]): boolean {
  return violations.some((violation) => violation.severity === "error");
}

/**
 * Check placement invariants of a generated map.
 *
 * Checks:
 * - Every house and unit is on navigable terrain
 * - Houses have no water or forest around them
 * - Houses are at Chebyshev distance ≥ 2 from each other
 * - Houses come from distinct buckets
 * - Unit counts stay within the configured maximum
 * - Checksum matches the recomputed value
 */
export function validateMap(map: SkirmishMapArtifact): MapValidationResult {
  const violations: Violation[] = [];
  const { grid, config } = map;
  const houses = [map.allyHouse, ...map.enemyHouses];

  const cell = (index: number): string =>
    `(${grid.indexToX(index)}, ${grid.indexToY(index)})`;

  for (const [label, cells] of [
    ["house", houses],
    ["ally unit", map.allyUnits],
    ["enemy unit", map.enemyUnits],
  ] as const) {
    for (const index of cells) {
      if (!grid.isNavigableIndex(index)) {
        violations.push({
          type: "invariant.navigable",
          message: `${label} at ${cell(index)} is not on navigable terrain`,
          severity: "error",
        });
      }
    }
  }

  for (const house of houses) {
    if (!hasHazardFreeNeighbourhood(grid, house)) {
      violations.push({
        type: "invariant.house.clearance",
        message: `House at ${cell(house)} touches water or forest`,
        severity: "error",
      });
    }
  }

  for (let i = 0; i < houses.length; i++) {
    for (let j = i + 1; j < houses.length; j++) {
      const a = houses[i];
      const b = houses[j];
      if (a === undefined || b === undefined) continue;
      const distance = chebyshevDistance(grid.indexToPoint(a), grid.indexToPoint(b));
      if (distance < 2) {
        violations.push({
          type: "invariant.house.spacing",
          message: `Houses at ${cell(a)} and ${cell(b)} are ${distance} apart`,
          severity: "error",
        });
      }
    }
  }

  const keys = houses.map((house) =>
    bucketKeyOf(grid.indexToX(house), grid.indexToY(house), config.bucketWidth, config.bucketHeight),
  );
  if (new Set(keys).size !== keys.length) {
    violations.push({
      type: "invariant.house.bucket",
      message: `Houses share a bucket: keys ${keys.join(", ")}`,
      severity: "error",
    });
  }

  if (map.allyUnits.length > config.maxAllyUnits) {
    violations.push({
      type: "invariant.capacity.ally",
      message: `${map.allyUnits.length} ally units exceed the maximum of ${config.maxAllyUnits}`,
      severity: "error",
    });
  }
  if (map.enemyUnits.length > config.maxEnemyUnits) {
    violations.push({
      type: "invariant.capacity.enemy",
      message: `${map.enemyUnits.length} enemy units exceed the maximum of ${config.maxEnemyUnits}`,
      severity: "error",
    });
  }

  const expectedAlly = config.maxAllyUnits;
  const expectedEnemy =
    map.enemyHouses.length > 0
      ? config.maxEnemyUnits - (config.maxEnemyUnits % map.enemyHouses.length)
      : 0;
  if (map.allyUnits.length < expectedAlly || map.enemyUnits.length < expectedEnemy) {
    violations.push({
      type: "capacity.shortfall",
      message: `Placed ${map.allyUnits.length}/${expectedAlly} ally and ${map.enemyUnits.length}/${expectedEnemy} enemy units`,
      severity: "warning",
    });
  }

  const checksum = calculateMapChecksum({
    width: map.width,
    height: map.height,
    terrain: grid.getRawDataCopy(),
    allyHouse: map.allyHouse,
    allyUnits: map.allyUnits,
    enemyHouses: map.enemyHouses,
    enemyUnits: map.enemyUnits,
  });
  if (checksum !== map.checksum) {
    violations.push({
      type: "invariant.checksum",
      message: `Checksum mismatch: stored ${map.checksum}, computed ${checksum}`,
      severity: "error",
    });
  }

  if (hasErrorViolations(violations)) {
    return { success: false, violations };
  }
  return { success: true, violations };
}

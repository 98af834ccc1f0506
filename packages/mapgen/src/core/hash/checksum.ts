/**
 * Map checksum
 *
 * Format: "v{version}:{hash}". Bump CHECKSUM_VERSION whenever the hashed
 * fields or their order change.
 */

import { createFNV64Hasher } from "./fnv64";

export const CHECKSUM_VERSION = 1;

export interface ChecksumInput {
  readonly width: number;
  readonly height: number;
  readonly terrain: Uint8Array;
  readonly allyHouse: number;
  readonly allyUnits: readonly number[];
  readonly enemyHouses: readonly number[];
  readonly enemyUnits: readonly number[];
}

/**
 * Parse a versioned checksum. Returns null when the format does not match.
 */
export function parseChecksum(checksum: string): {
  version: number;
  hash: string;
} | null {
  const match = checksum.match(/^v(\d+):([0-9a-f]{16})$/);
  if (!match || !match[1] || !match[2]) return null;
  return {
    version: parseInt(match[1], 10),
    hash: match[2],
  };
}

/**
 * Checksum over dimensions, terrain bytes and every placement, in order.
 */
export function calculateMapChecksum(input: ChecksumInput): string {
  const hasher = createFNV64Hasher();

  hasher.updateInt32(CHECKSUM_VERSION);
  hasher.updateInt32(input.width);
  hasher.updateInt32(input.height);
  hasher.updateBytes(input.terrain);
  hasher.updateInt32(input.allyHouse);
  hasher.updateInt32List(input.allyUnits);
  hasher.updateInt32List(input.enemyHouses);
  hasher.updateInt32List(input.enemyUnits);

  return `v${CHECKSUM_VERSION}:${hasher.digest()}`;
}

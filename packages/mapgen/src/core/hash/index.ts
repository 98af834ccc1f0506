/**
 * Hash utilities: FNV-64 and the map checksum.
 */

export * from "./checksum";
export * from "./fnv64";

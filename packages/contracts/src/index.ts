export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./random/system-random";
export * from "./schemas/config";
export * from "./schemas/seed";
export * from "./types/error";
export * from "./types/map";
export * from "./types/result";
export * from "./utils/builder";

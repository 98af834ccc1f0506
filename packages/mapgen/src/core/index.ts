/**
 * Core building blocks shared by the generation passes.
 */

export * from "./data-structures";
export * from "./geometry/types";
export * from "./grid";
export * from "./hash";
export * from "./noise/height-field";
export * from "./seed/derivation";

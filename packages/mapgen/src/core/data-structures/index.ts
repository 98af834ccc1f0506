/**
 * Data structures used by the generation passes
 */

export { FastQueue } from "./fast-queue";

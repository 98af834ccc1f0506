import { z } from "zod";

export const MapGenConfigSchema = z
  .object({
    minWalkableFraction: z
      .number()
      .min(0, { error: "minWalkableFraction must be between 0 and 1" })
      .max(1, { error: "minWalkableFraction must be between 0 and 1" }),
    octaves: z.number().int().min(1).max(4),
    noiseStep: z.number().positive(),
    bucketWidth: z
      .number()
      .int()
      .min(3, { error: "Buckets need at least 3 columns to keep an interior" }),
    bucketHeight: z
      .number()
      .int()
      .min(3, { error: "Buckets need at least 3 rows to keep an interior" }),
    maxAllyUnits: z.number().int().min(0),
    maxEnemyUnits: z.number().int().min(0),
    unitAreaBudget: z.number().int().min(1),
    minEnemyHouses: z.number().int().min(1),
    maxEnemyHouses: z.number().int().min(1),
    allowUnitsOnWater: z.boolean(),
    trace: z.boolean(),
  })
  .refine((data) => data.minEnemyHouses <= data.maxEnemyHouses, {
    message: "minEnemyHouses must be <= maxEnemyHouses",
    path: ["maxEnemyHouses"],
  });

export type ValidatedMapGenConfig = z.infer<typeof MapGenConfigSchema>;

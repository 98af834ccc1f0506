import { z } from "zod";

const INT32_MAX = 0x7fffffff;

const SeedValueSchema = z
  .number()
  .int({ error: "Seed values must be integers" })
  .min(0, { error: "Seed values must be non-negative" })
  .max(INT32_MAX, { error: "Seed values must fit in int32" });

/**
 * Seeds after substitution: both present and in int32 range.
 */
export const MapSeedsSchema = z.object({
  terrain: SeedValueSchema,
  locations: SeedValueSchema,
});

/**
 * Seeds as a caller may pass them. Negative values are allowed and mean
 * "substitute a seed".
 */
export const MapSeedInputSchema = z.object({
  terrain: z.number().int().min(-INT32_MAX - 1).max(INT32_MAX).optional(),
  locations: z.number().int().min(-INT32_MAX - 1).max(INT32_MAX).optional(),
});

/**
 * Zod schema for a serialized parser config (e.g. a JSON file).
 *
 * Mirrors ArgConfig, with the inverse generator named instead of given
 * as a function.
 */

import { z } from "zod";

export const InverseStrategySchema = z.enum(["none", "prefix"]);

export const ArgConfigSchema = z
  .object({
    preset: z.enum(["default", "go"]).optional(),
    longPrefix: z.string().min(1, "Long option prefix must not be empty").optional(),
    shortPrefix: z.string().min(1, "Short option prefix must not be empty").nullable().optional(),
    disableOptionsAfter: z.string().min(1, "Separator must not be empty").nullable().optional(),
    noOptionsAfterPositional: z.boolean().optional(),
    inverse: InverseStrategySchema.optional(),
  })
  .strict()
  .refine((cfg) => cfg.shortPrefix == null || cfg.shortPrefix !== cfg.longPrefix, {
    message: "Short and long option prefixes must differ",
    path: ["shortPrefix"],
  });

export type SerializedArgConfig = z.infer<typeof ArgConfigSchema>;
export type InverseStrategy = z.infer<typeof InverseStrategySchema>;

import { z } from "zod";

export const levelNameSchema = z.enum(["debug", "info", "warn", "error"]);
export const colorModeSchema = z.enum(["auto", "always", "never"]);

export const loggerConfigSchema = z
  .object({
    level: levelNameSchema.optional(),
    // A layout pattern or the name of a built-in layout
    timeLayout: z.string().min(1).optional(),
    prefix: z.string().optional(),
    color: colorModeSchema.optional(),
  })
  .strict();

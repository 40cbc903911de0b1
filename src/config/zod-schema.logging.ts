import { z } from "zod";

export const LoggingSchema = z
  .object({
    level: z.enum(["debug", "info", "warn", "error"]).optional(),
  })
  .strict()
  .optional();

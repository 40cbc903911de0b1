import { z } from "zod";

export const TuningSchema = z
  .object({
    enabled: z.boolean().optional(),
    maturityDays: z.number().positive().optional(),
    maxDecisionsPerRun: z.number().int().positive().optional(),
    requiredParameters: z.array(z.string().min(1)).optional(),
    gatedDecisionsOnly: z.boolean().optional(),
  })
  .strict()
  .optional();

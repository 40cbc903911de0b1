import { z } from "zod";

export const AnalysisSchema = z
  .object({
    enabled: z.boolean().optional(),
    universe: z.array(z.string().min(1)).optional(),
    universeFile: z.string().min(1).optional(),
    tickerSuffix: z.string().optional(),
    lookbackBars: z.number().int().positive().optional(),
    concurrency: z.number().int().positive().max(64).optional(),
  })
  .strict()
  .optional();

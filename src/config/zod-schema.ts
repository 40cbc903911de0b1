import { z } from "zod";
import { AnalysisSchema } from "./zod-schema.analysis.js";
import { LoggingSchema } from "./zod-schema.logging.js";
import { NotificationsSchema, ProvidersSchema } from "./zod-schema.providers.js";
import { TuningSchema } from "./zod-schema.tuning.js";

export const ScoreloopSchema = z
  .object({
    logging: LoggingSchema,
    analysis: AnalysisSchema,
    tuning: TuningSchema,
    providers: ProvidersSchema,
    notifications: NotificationsSchema,
  })
  .strict();

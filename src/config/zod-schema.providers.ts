import { z } from "zod";

const retryPolicyShape = {
  timeoutMs: z.number().int().positive().optional(),
  retries: z.number().int().nonnegative().max(10).optional(),
  retryDelayMs: z.number().int().nonnegative().optional(),
};

const PriceProviderSchema = z
  .object({
    ...retryPolicyShape,
    baseUrl: z.string().url().optional(),
    userAgent: z.string().optional(),
  })
  .strict()
  .optional();

const NewsProviderSchema = z
  .object({
    ...retryPolicyShape,
    baseUrl: z.string().url().optional(),
    userAgent: z.string().optional(),
    maxItems: z.number().int().positive().optional(),
    maxBytes: z.number().int().positive().optional(),
    rateLimitPerHostPerMinute: z.number().nonnegative().optional(),
    locale: z.string().optional(),
  })
  .strict()
  .optional();

const AiProviderSchema = z
  .object({
    ...retryPolicyShape,
    model: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    apiKeyEnv: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).optional(),
  })
  .strict()
  .optional();

const MailProviderSchema = z
  .object({
    enabled: z.boolean().optional(),
    host: z.string().min(1).optional(),
    port: z.number().int().positive().optional(),
    secure: z.boolean().optional(),
    user: z.string().optional(),
    from: z.string().optional(),
    to: z.array(z.string().email()).optional(),
    passwordEnv: z.string().min(1).optional(),
  })
  .strict()
  .optional();

export const ProvidersSchema = z
  .object({
    prices: PriceProviderSchema,
    news: NewsProviderSchema,
    ai: AiProviderSchema,
    mail: MailProviderSchema,
  })
  .strict()
  .optional();

export const NotificationsSchema = z
  .object({
    runSummary: z.boolean().optional(),
  })
  .strict()
  .optional();

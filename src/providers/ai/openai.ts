import OpenAI from "openai";
import { z } from "zod";
import type { AiProviderConfig } from "../../config/types.providers.js";
import type { AiAdvisor, RationaleReply, TuningSuggestion } from "../types.js";
import { AIServiceError } from "../../errors.js";
import { RiskLevelSchema } from "../../analysis/schema.js";
import {
  RATIONALE_SYSTEM_PROMPT,
  TUNING_SYSTEM_PROMPT,
  buildRationalePrompt,
  buildTuningPrompt,
} from "./prompts.js";

const DEFAULT_MODEL = "gpt-4o-mini";
const DEFAULT_TEMPERATURE = 0.2;

export type ChatRequest = {
  model: string;
  temperature: number;
  response_format: { type: "json_object" };
  messages: Array<{ role: "system" | "user"; content: string }>;
};

export type ChatReply = {
  choices: Array<{ message: { content: string | null } }>;
};

export type ChatCompleter = (request: ChatRequest) => Promise<ChatReply>;

const RationaleReplySchema = z.object({
  rationale: z.string().trim().min(1),
  risk: z.preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
    RiskLevelSchema,
  ),
});

const TuningReplySchema = z.object({
  suggestions: z
    .array(
      z.object({
        name: z.string().min(1),
        value: z.number(),
        reason: z.string().optional(),
      }),
    )
    .default([]),
});

/** Models sometimes wrap JSON mode output in a code fence anyway. */
export function extractJson(content: string): unknown {
  const cleaned = content.replace(/```json\n?|```/g, "").trim();
  try {
    return JSON.parse(cleaned);
  } catch (err) {
    throw new AIServiceError("AI reply is not valid JSON", { cause: err });
  }
}

function createDefaultCompleter(cfg: AiProviderConfig, env: NodeJS.ProcessEnv): ChatCompleter {
  const keyEnv = cfg.apiKeyEnv ?? "OPENAI_API_KEY";
  let client: OpenAI | null = null;
  return async (request) => {
    if (!client) {
      const apiKey = env[keyEnv]?.trim();
      if (!apiKey) {
        throw new AIServiceError(`${keyEnv} is not set`);
      }
      client = new OpenAI({ apiKey, baseURL: cfg.baseUrl, maxRetries: 0 });
    }
    return await client.chat.completions.create(request);
  };
}

export function createOpenAiAdvisor(
  cfg: AiProviderConfig = {},
  deps: { complete?: ChatCompleter; env?: NodeJS.ProcessEnv } = {},
): AiAdvisor {
  const complete = deps.complete ?? createDefaultCompleter(cfg, deps.env ?? process.env);
  const model = cfg.model ?? DEFAULT_MODEL;
  const temperature = cfg.temperature ?? DEFAULT_TEMPERATURE;

  const ask = async <T>(
    system: string,
    user: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> => {
    let reply: ChatReply;
    try {
      reply = await complete({
        model,
        temperature,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: system },
          { role: "user", content: user },
        ],
      });
    } catch (err) {
      if (err instanceof AIServiceError) {
        throw err;
      }
      throw new AIServiceError(`AI request failed: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }
    const content = reply.choices[0]?.message.content;
    if (!content) {
      throw new AIServiceError("AI reply was empty");
    }
    const parsed = schema.safeParse(extractJson(content));
    if (!parsed.success) {
      throw new AIServiceError("AI reply did not match the expected shape", { cause: parsed.error });
    }
    return parsed.data;
  };

  return {
    async generateRationaleAndRisk(input): Promise<RationaleReply> {
      return await ask(RATIONALE_SYSTEM_PROMPT, buildRationalePrompt(input), RationaleReplySchema);
    },

    async suggestTuning(input): Promise<TuningSuggestion[]> {
      const reply = await ask(TUNING_SYSTEM_PROMPT, buildTuningPrompt(input), TuningReplySchema);
      return reply.suggestions;
    },
  };
}

import OpenAI from "openai";

import { ConfigError } from "@guidedeck/shared";
import type { OpenAiJsonSchema } from "@guidedeck/shared";

const OPENAI_CLIENT_MAX_RETRIES = 0;

/** The slice of the OpenAI client the adapters call; tests pass a fake. */
export type ResponsesClient = {
  responses: {
    create(body: OpenAI.Responses.ResponseCreateParamsNonStreaming): Promise<{ id: string; output_text: string }>;
  };
};

let cachedClient: OpenAI | null = null;

export function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export function getClient(apiKey?: string): OpenAI {
  const key = apiKey ?? process.env.OPENAI_API_KEY;
  if (!key) {
    throw new ConfigError("OPENAI_API_KEY is required");
  }

  if (apiKey) {
    return new OpenAI({ apiKey: key, maxRetries: OPENAI_CLIENT_MAX_RETRIES });
  }

  if (!cachedClient) {
    cachedClient = new OpenAI({ apiKey: key, maxRetries: OPENAI_CLIENT_MAX_RETRIES });
  }

  return cachedClient;
}

export function jsonSchemaFormat(jsonSchema: OpenAiJsonSchema): OpenAI.Responses.ResponseFormatTextJSONSchemaConfig {
  return {
    type: "json_schema",
    name: jsonSchema.name,
    schema: jsonSchema.schema,
    strict: true,
  };
}

export function getOutputText(response: { output_text: string }): string {
  if (typeof response.output_text === "string" && response.output_text.trim().length > 0) {
    return response.output_text;
  }

  throw new Error("OpenAI response did not contain output text");
}

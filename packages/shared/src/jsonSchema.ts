import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

import { isRecord } from "./guards.js";

export type OpenAiJsonSchema = {
  name: string;
  schema: Record<string, unknown>;
  strict: true;
};

export function zodToOpenAiJsonSchema(name: string, schema: z.ZodTypeAny): OpenAiJsonSchema {
  // Call without `name` to get a flat schema (no $ref / definitions wrapper).
  const raw: unknown = zodToJsonSchema(schema, { $refStrategy: "none" });
  const { $schema: _schema, ...rest } = isRecord(raw) ? raw : {};

  // Structured Outputs requires additionalProperties: false on every object.
  addAdditionalPropertiesFalse(rest);

  return {
    name,
    schema: rest,
    strict: true,
  };
}

function addAdditionalPropertiesFalse(node: unknown): void {
  if (Array.isArray(node)) {
    for (const item of node) addAdditionalPropertiesFalse(item);
    return;
  }
  if (!isRecord(node)) return;
  if (node.type === "object" && node.properties) {
    node.additionalProperties = false;
  }
  for (const value of Object.values(node)) addAdditionalPropertiesFalse(value);
}

import {
  ConfigError,
  GenerateSlidesSchema,
  SlideDecodeError,
  decodeSlideList,
  errorMessage,
  isRetryableNetworkError,
  silentLogger,
  withExponentialBackoff,
  zodToOpenAiJsonSchema,
} from "@guidedeck/shared";
import type { Logger, RetryOptions } from "@guidedeck/shared";

import { envNumber, getClient, getOutputText, jsonSchemaFormat } from "./client.js";
import type { ResponsesClient } from "./client.js";

export const CONTENT_PLACEHOLDER = "{{content}}";

const SYSTEM_PROMPT =
  "You convert facilitator guides into well-structured slide content. " +
  "Return one record per slide with slide_number, title, content and layout; " +
  "use null for fields that do not apply.";

const GENERATE_SLIDES_SCHEMA = zodToOpenAiJsonSchema("generate_slides", GenerateSlidesSchema);

export type SlideExtractorOptions = {
  client?: ResponsesClient;
  apiKey?: string;
  model: string;
  retry?: RetryOptions;
  logger?: Logger;
};

export type ExtractSlidesParams = {
  promptTemplate: string;
  /** Salvage individual records from malformed output. */
  force?: boolean;
};

export type SlideExtractor = (guideText: string, params: ExtractSlidesParams) => Promise<unknown[]>;

export function fillPromptTemplate(template: string, content: string): string {
  if (!template.includes(CONTENT_PLACEHOLDER)) {
    throw new ConfigError(`Prompt template must contain ${CONTENT_PLACEHOLDER}`);
  }
  return template.replaceAll(CONTENT_PLACEHOLDER, content);
}

function shouldRetryExtraction(error: unknown): boolean {
  return error instanceof SlideDecodeError || isRetryableNetworkError(error);
}

/**
 * Guide text → raw slide records via a strict-JSON Responses call. Output
 * goes through the same decoder as slide files, so a `{ slides: [...] }`
 * wrapper or a noisy array both work.
 */
export function createSlideExtractor(options: SlideExtractorOptions): SlideExtractor {
  const log = options.logger ?? silentLogger;

  return async (guideText, params) => {
    const prompt = fillPromptTemplate(params.promptTemplate, guideText);
    const client = options.client ?? getClient(options.apiKey);

    return withExponentialBackoff(
      async (attempt) => {
        log.info("Requesting slides", { model: options.model, attempt: attempt + 1 });
        const response = await client.responses.create({
          model: options.model,
          input: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: prompt },
          ],
          text: { format: jsonSchemaFormat(GENERATE_SLIDES_SCHEMA) },
          store: false,
        });

        let text: string;
        try {
          text = getOutputText(response);
        } catch (error) {
          throw new SlideDecodeError("Model returned no slide output", { cause: error });
        }
        const records = decodeSlideList(text, { force: params.force, logger: log });
        log.info("Extracted slides", { count: records.length, responseId: response.id });
        return records;
      },
      {
        retries: envNumber("OPENAI_RESPONSES_RETRIES", 2),
        initialDelayMs: 2_000,
        shouldRetry: shouldRetryExtraction,
        onRetry: (error, attempt, delayMs) => {
          log.warn("Slide extraction failed, retrying", {
            attempt: attempt + 1,
            delayMs,
            error: errorMessage(error),
          });
        },
        ...options.retry,
      },
    );
  };
}

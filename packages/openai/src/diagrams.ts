import type { DiagramRepairRequest, DiagramRepairer } from "@guidedeck/diagrams";
import { stripCodeFence } from "@guidedeck/diagrams";
import { errorMessage, silentLogger, withExponentialBackoff } from "@guidedeck/shared";
import type { Logger, RetryOptions } from "@guidedeck/shared";

import { getClient, getOutputText } from "./client.js";
import type { ResponsesClient } from "./client.js";

const REPAIR_INSTRUCTIONS =
  "You are a Mermaid diagram expert who returns only fixed Mermaid syntax, with no explanation and no markdown fence.";

export type DiagramRepairerOptions = {
  client?: ResponsesClient;
  apiKey?: string;
  model: string;
  retry?: RetryOptions;
  logger?: Logger;
};

export function buildRepairPrompt(request: DiagramRepairRequest): string {
  return [
    `Fix the following ${request.kind} Mermaid diagram, which fails to render.`,
    "",
    "Error message:",
    request.error,
    "",
    "Current diagram:",
    request.source,
    "",
    "Guidelines:",
    '- Put spaces around arrows (e.g. "A --> B")',
    '- No extra spaces inside node brackets (use "[Label]", not "[ Label ]")',
    "- Use capital letters for directions (TD, LR, BT, RL)",
    "- Keep diagrams to 15 or fewer nodes",
    '- Start with the diagram type and direction (e.g. "flowchart TD")',
    "- Only use standard Mermaid diagram types",
  ].join("\n");
}

class OpenAiDiagramRepairer implements DiagramRepairer {
  constructor(private readonly options: DiagramRepairerOptions) {}

  async repair(request: DiagramRepairRequest): Promise<string> {
    const log = this.options.logger ?? silentLogger;
    const client = this.options.client ?? getClient(this.options.apiKey);

    const response = await withExponentialBackoff(
      async () =>
        client.responses.create({
          model: this.options.model,
          instructions: REPAIR_INSTRUCTIONS,
          input: buildRepairPrompt(request),
          store: false,
        }),
      {
        onRetry: (error, attempt, delayMs) => {
          log.warn("Diagram repair request failed, retrying", {
            kind: request.kind,
            attempt: attempt + 1,
            delayMs,
            error: errorMessage(error),
          });
        },
        ...this.options.retry,
      },
    );

    const fixed = stripCodeFence(getOutputText(response));
    log.info("Diagram source repaired", { kind: request.kind, responseId: response.id });
    return fixed;
  }
}

export function createDiagramRepairer(options: DiagramRepairerOptions): DiagramRepairer {
  return new OpenAiDiagramRepairer(options);
}

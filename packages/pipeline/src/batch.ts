import { errorMessage, getDiagnosticsCounters, silentLogger } from "@guidedeck/shared";
import type { Logger } from "@guidedeck/shared";

export type BatchItemResult<T> =
  | { input: string; ok: true; result: T }
  | { input: string; ok: false; error: string };

export type BatchSummary<T> = {
  items: BatchItemResult<T>[];
  succeeded: number;
  failed: number;
  exitCode: 0 | 1;
};

export type RunBatchOptions = {
  logger?: Logger;
  onError?: (error: unknown, input: string) => void;
};

/**
 * Build each input in turn. A failed input is recorded and the batch moves
 * on; the exit code is 1 when anything failed.
 */
export async function runBatch<T>(
  inputs: readonly string[],
  build: (input: string) => Promise<T>,
  options: RunBatchOptions = {},
): Promise<BatchSummary<T>> {
  const log = options.logger ?? silentLogger;
  const items: BatchItemResult<T>[] = [];

  for (const input of inputs) {
    try {
      items.push({ input, ok: true, result: await build(input) });
    } catch (error) {
      log.error("Deck failed", { input, error: errorMessage(error) });
      options.onError?.(error, input);
      items.push({ input, ok: false, error: errorMessage(error) });
    }
  }

  const failed = items.filter((item) => !item.ok).length;
  const summary: BatchSummary<T> = {
    items,
    succeeded: items.length - failed,
    failed,
    exitCode: failed > 0 ? 1 : 0,
  };
  log.info("Batch finished", {
    total: items.length,
    succeeded: summary.succeeded,
    failed,
    failedInputs: items.filter((item) => !item.ok).map((item) => item.input),
    diagnostics: getDiagnosticsCounters(),
  });
  return summary;
}

/**
 * Build slide decks from facilitator guides or slide JSON files.
 *
 *   build [--config guidedeck.config.json] [--out dir] [--force] <input...>
 */

import { fileURLToPath } from "node:url";

import { parseBuildArgs, runBuild } from "@guidedeck/pipeline";
import { errorMessage, logger } from "@guidedeck/shared";

export async function main(argv: readonly string[]): Promise<number> {
  const summary = await runBuild(parseBuildArgs(argv));
  for (const item of summary.items) {
    console.log(
      JSON.stringify(
        item.ok
          ? { input: item.input, ok: true, slides: item.result.deck.length, outputs: item.result.outputs }
          : { input: item.input, ok: false, error: item.error },
      ),
    );
  }
  return summary.exitCode;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((error) => {
      logger.error("build failed", { error: errorMessage(error) });
      process.exit(1);
    });
}

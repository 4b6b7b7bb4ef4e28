import { fileURLToPath } from "node:url";
import path from "node:path";
import fs from "node:fs/promises";

import { isNotFoundError } from "@guidedeck/shared";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Source tree first, then the layout tsc emits under dist/.
const TEMPLATE_DIRS = [
  path.resolve(__dirname, "..", "templates"),
  path.resolve(__dirname, "..", "..", "..", "..", "packages", "artifacts", "templates"),
];

export async function loadTemplateFile(filename: string): Promise<string> {
  for (const dir of TEMPLATE_DIRS) {
    try {
      return await fs.readFile(path.join(dir, filename), "utf8");
    } catch (error) {
      if (!isNotFoundError(error)) throw error;
    }
  }
  throw new Error(`Template ${filename} not found (looked in ${TEMPLATE_DIRS.join(", ")})`);
}

/** Replaces `{{KEY}}` placeholders in one pass; unknown keys stay as written. */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (match, key: string) => values[key] ?? match);
}

import { execFile } from "node:child_process";
import fs from "node:fs/promises";
import { promisify } from "node:util";

import { silentLogger } from "@guidedeck/shared";
import type { Logger } from "@guidedeck/shared";

const execFileAsync = promisify(execFile);

export type DiagramRenderRequest = {
  source: string;
  /** Target file; the extension (.png or .svg) selects the output format. */
  outputPath: string;
};

/** External collaborator that turns diagram source into an image file. */
export interface DiagramRenderer {
  render(request: DiagramRenderRequest): Promise<void>;
}

export type MermaidCliRendererOptions = {
  command?: string;
  configPath?: string | null;
  timeoutMs?: number;
  logger?: Logger;
};

async function isReadable(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Renders through the Mermaid CLI (`mmdc`). The source is written to a
 * `.mmd` file beside the output first.
 */
export class MermaidCliRenderer implements DiagramRenderer {
  private readonly command: string;
  private readonly configPath: string | null;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: MermaidCliRendererOptions = {}) {
    this.command = options.command ?? "mmdc";
    this.configPath = options.configPath ?? null;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.logger = options.logger ?? silentLogger;
  }

  async render(request: DiagramRenderRequest): Promise<void> {
    const mmdPath = request.outputPath.replace(/\.(png|svg)$/i, "") + ".mmd";
    await fs.writeFile(mmdPath, request.source, "utf8");

    const args = ["-i", mmdPath, "-o", request.outputPath];
    if (this.configPath && (await isReadable(this.configPath))) {
      args.push("-c", this.configPath);
    }

    this.logger.debug("Running diagram renderer", { command: this.command, args });
    try {
      await execFileAsync(this.command, args, { timeout: this.timeoutMs, maxBuffer: 10 * 1024 * 1024 });
    } catch (error) {
      const stderr =
        typeof error === "object" && error !== null && "stderr" in error && typeof error.stderr === "string"
          ? error.stderr.trim()
          : "";
      throw new Error(stderr || (error instanceof Error ? error.message : String(error)), { cause: error });
    }
  }
}

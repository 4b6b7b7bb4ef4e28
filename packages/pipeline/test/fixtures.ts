import fs from "node:fs/promises";

import { vi } from "vitest";

import type { FetchedImage } from "@guidedeck/assets";
import type { DiagramRenderRequest } from "@guidedeck/diagrams";
import { parseDeckConfig } from "@guidedeck/shared";
import type { DeckConfigInput } from "@guidedeck/shared";

export function fakeRenderer() {
  return {
    render: vi.fn(async (request: DiagramRenderRequest) => {
      await fs.writeFile(request.outputPath, `rendered:${request.source.length}`);
    }),
  };
}

export function offlineFetcher() {
  return {
    fetch: vi.fn(async (url: string): Promise<FetchedImage> => {
      throw new Error(`offline: ${url}`);
    }),
  };
}

export function testConfig(input: DeckConfigInput = {}) {
  return parseDeckConfig(input, {});
}

export const WORKSHOP_SLIDES = [
  { title: "Intro", content: "Welcome" },
  { title: "Flow", diagram_type: "flowchart", diagram_content: "flowchart TD\n  A --> B" },
  { title: "Stats", content: "50% growth", image_url: "http://x/y.png" },
];

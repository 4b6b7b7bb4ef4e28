import { vi } from "vitest";

import type { FetchedImage } from "@guidedeck/assets";
import { createLogger, normalizeSlides } from "@guidedeck/shared";
import type { Logger, SlideRecord } from "@guidedeck/shared";

/** Intro (inferred title) followed by Stats (inferred two_column with a photo). */
export function twoSlideDeck(): SlideRecord[] {
  return normalizeSlides([
    { title: "Intro", content: "Welcome", layout: null },
    { title: "Stats", content: "50% growth", image_url: "http://x/y.png", layout: null },
  ]);
}

export function failingFetcher() {
  return {
    fetch: vi.fn(async (url: string): Promise<FetchedImage> => {
      throw new Error(`offline: ${url}`);
    }),
  };
}

export function staticFetcher(bytes: number[], contentType: string | null = "image/png") {
  return {
    fetch: vi.fn(async (_url: string): Promise<FetchedImage> => ({ bytes: new Uint8Array(bytes), contentType })),
  };
}

export function capturingLogger(): { logger: Logger; events: Array<Record<string, unknown>> } {
  const events: Array<Record<string, unknown>> = [];
  const logger = createLogger({
    level: "debug",
    sink: (_level, line) => {
      events.push(JSON.parse(line));
    },
  });
  return { logger, events };
}

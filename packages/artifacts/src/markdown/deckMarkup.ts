import fs from "node:fs/promises";

import { isRemoteRef } from "@guidedeck/assets";
import { errorMessage, isNotFoundError, normalizeBulletMarkers, silentLogger } from "@guidedeck/shared";
import type { Logger, SlideRecord } from "@guidedeck/shared";

import { renderSlides } from "../dispatch.js";
import type { SlideBackend } from "../dispatch.js";
import { isDataUri, resolveLocalImagePath } from "../images.js";
import { collectImageRefs, slideBullets, slideImage, slideNotes, slideText, twoColumnParts } from "../slideParts.js";
import type { SlideImage } from "../slideParts.js";

export type MarkupContext = {
  preferSvg: boolean;
  /** Vector markup for a raster reference, when one was found beside it. */
  svgFor: (ref: string) => string | null;
};

export type RenderDeckMarkupOptions = {
  baseDir: string;
  preferSvg?: boolean;
  logger?: Logger;
};

function blocks(...parts: string[]): string {
  return parts
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join("\n\n");
}

function heading(title: string | null, marker?: string): string {
  const text = slideText(title).trim();
  if (!text) return "";
  return marker ? `# ${text} ${marker}` : `# ${text}`;
}

function imageMarkup(image: SlideImage | null, context: MarkupContext): string {
  if (!image) return "";
  if (context.preferSvg) {
    const svg = context.svgFor(image.ref);
    if (svg) return `$$$ svg\n${svg.trim()}\n$$$`;
  }
  return `![](${image.ref})`;
}

function bulletList(slide: SlideRecord): string {
  return slideBullets(slide)
    .map((bullet) => `* ${bullet}`)
    .join("\n");
}

function columnText(text: string): string {
  return normalizeBulletMarkers(text);
}

/** md2gslides-flavoured markdown, one string per slide body. */
export const deckMarkupBackend: SlideBackend<string, MarkupContext> = {
  name: "markdown",
  layouts: {
    title: (slide) => blocks(heading(slide.title, "{.big}"), slideText(slide.content)),
    section: (slide) => heading(slide.title, "{.section}"),
    content: (slide, context) => blocks(heading(slide.title), bulletList(slide), imageMarkup(slideImage(slide), context)),
    two_column: (slide, context) => {
      const parts = twoColumnParts(slide);
      const right = parts.imageReplacesRight
        ? imageMarkup(parts.image, context)
        : blocks(columnText(parts.right), imageMarkup(parts.image, context));
      return blocks(heading(slide.title), columnText(parts.left), "{.column}", right);
    },
    quote: (slide) => {
      const quoted = slideText(slide.content)
        .trim()
        .split("\n")
        .map((line) => `> ${line}`.trimEnd())
        .join("\n");
      const attribution = slideText(slide.title).trim();
      return blocks(slide.content?.trim() ? quoted : "", attribution ? `— ${attribution}` : "");
    },
    main_point: (slide) => blocks(heading(slide.title, "{.big}"), slideText(slide.content)),
    big_number: (slide) => blocks(heading(slide.title, "{.big}"), slideText(slide.content)),
    caption: (slide, context) => blocks(imageMarkup(slideImage(slide), context), slideText(slide.title)),
    blank: (slide) => {
      const image = slideImage(slide);
      return image ? `![](${image.ref}){.background}` : "";
    },
  },
  fallback: (slide) => blocks(heading(slide.title), slideText(slide.content)),
};

function wrapSlide(body: string, slide: SlideRecord): string {
  const notes = slideNotes(slide);
  const notesSection = notes ? `\n\n<!--\n${notes.replaceAll("-->", "- ->")}\n-->` : "";
  return `---\n\n${body}${notesSection}\n`;
}

function svgSiblingRef(ref: string): string | null {
  return /\.png$/i.test(ref) ? ref.replace(/\.png$/i, ".svg") : null;
}

async function loadSvgSiblings(
  deck: readonly SlideRecord[],
  baseDir: string,
  log: Logger,
): Promise<Map<string, string>> {
  const found = new Map<string, string>();
  for (const ref of collectImageRefs(deck)) {
    if (isRemoteRef(ref) || isDataUri(ref)) continue;
    const svgRef = svgSiblingRef(ref);
    if (!svgRef) continue;
    try {
      found.set(ref, await fs.readFile(resolveLocalImagePath(svgRef, baseDir), "utf8"));
    } catch (error) {
      if (!isNotFoundError(error)) {
        log.warn("Unable to read SVG beside image", { ref, error: errorMessage(error) });
      }
    }
  }
  return found;
}

/**
 * Render the deck as md2gslides markup. Images stay as references; with
 * `preferSvg`, a PNG that has an SVG beside it is inlined as a `$$$ svg` block.
 */
export async function renderDeckMarkup(
  deck: readonly SlideRecord[],
  options: RenderDeckMarkupOptions,
): Promise<string> {
  const log = options.logger ?? silentLogger;
  const preferSvg = options.preferSvg ?? false;
  const svgs = preferSvg ? await loadSvgSiblings(deck, options.baseDir, log) : new Map<string, string>();

  const context: MarkupContext = {
    preferSvg,
    svgFor: (ref) => svgs.get(ref) ?? null,
  };
  const bodies = renderSlides(deckMarkupBackend, deck, context, log);
  return deck.map((slide, index) => wrapSlide(bodies[index] ?? "", slide)).join("\n");
}

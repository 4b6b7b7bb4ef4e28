import fs from "node:fs/promises";
import path from "node:path";

import { isRemoteRef } from "@guidedeck/assets";
import { REVEAL_THEMES, errorMessage, isRevealTheme, silentLogger } from "@guidedeck/shared";
import type { Logger, RevealTheme, SlideRecord } from "@guidedeck/shared";

import { renderSlides } from "../dispatch.js";
import type { SlideBackend } from "../dispatch.js";
import { escapeHtml, textAsHtml } from "../escape.js";
import { isDataUri, loadImage, resolveLocalImagePath, toDataUri } from "../images.js";
import type { ImageLoaderOptions } from "../images.js";
import { collectImageRefs, slideBullets, slideImage, slideNotes, slideText, twoColumnParts } from "../slideParts.js";
import { fillTemplate, loadTemplateFile } from "../templates.js";

export const REVEAL_VERSION = "4.6.0";
export const DEFAULT_REVEAL_THEME: RevealTheme = "black";
export const REVEAL_TEMPLATE_FILENAME = "revealjs.html";

export type HtmlContext = {
  /** The src to write for an image reference (data URI, copied asset or the reference itself). */
  imageSrc: (ref: string) => string;
};

function section(slide: SlideRecord, body: string, attributes = ""): string {
  const notes = slideNotes(slide);
  const aside = notes ? `\n  <aside class="notes">${textAsHtml(notes)}</aside>` : "";
  return `<section${attributes}>\n  ${body}${aside}\n</section>`;
}

function img(ref: string, slide: SlideRecord, context: HtmlContext): string {
  return `<img src="${escapeHtml(context.imageSrc(ref))}" alt="${escapeHtml(slideText(slide.title))}">`;
}

function list(items: string[]): string {
  if (items.length === 0) return "";
  return `<ul>${items.map((item) => `<li>${escapeHtml(item)}</li>`).join("")}</ul>`;
}

function textBlock(value: string): string {
  const trimmed = value.trim();
  if (!trimmed) return "";
  if (/^[ \t]*[-*•][ \t]+/m.test(trimmed)) {
    return list(
      trimmed
        .split("\n")
        .map((line) => line.trim().replace(/^[-*•]\s+/, ""))
        .filter((line) => line.length > 0),
    );
  }
  return `<p>${textAsHtml(trimmed)}</p>`;
}

function join(...parts: string[]): string {
  return parts.filter((part) => part.length > 0).join("\n  ");
}

export const revealDeckBackend: SlideBackend<string, HtmlContext> = {
  name: "html",
  layouts: {
    title: (slide) =>
      section(
        slide,
        join(`<h1>${escapeHtml(slideText(slide.title))}</h1>`, `<p>${textAsHtml(slideText(slide.content))}</p>`),
        ' class="title-slide"',
      ),
    section: (slide) => section(slide, `<h2>${escapeHtml(slideText(slide.title))}</h2>`, ' class="section-header"'),
    content: (slide, context) => {
      const image = slideImage(slide);
      return section(
        slide,
        join(
          `<h2>${escapeHtml(slideText(slide.title))}</h2>`,
          list(slideBullets(slide)),
          image ? img(image.ref, slide, context) : "",
        ),
      );
    },
    two_column: (slide, context) => {
      const parts = twoColumnParts(slide);
      const imageHtml = parts.image ? img(parts.image.ref, slide, context) : "";
      const right = parts.imageReplacesRight ? imageHtml : [textBlock(parts.right), imageHtml].join("");
      return section(
        slide,
        join(
          `<h2 style="width: 100%">${escapeHtml(slideText(slide.title))}</h2>`,
          `<div class="columns"><div class="column">${textBlock(parts.left)}</div><div class="column">${right}</div></div>`,
        ),
        ' class="two-column"',
      );
    },
    quote: (slide) => {
      const attribution = slideText(slide.title).trim();
      return section(
        slide,
        join(
          `<blockquote>"${textAsHtml(slideText(slide.content).trim())}"</blockquote>`,
          attribution ? `<p><em>— ${escapeHtml(attribution)}</em></p>` : "",
        ),
        ' class="quote"',
      );
    },
    main_point: (slide) => {
      const body = slideText(slide.content).trim();
      return section(
        slide,
        join(`<h1>${escapeHtml(slideText(slide.title))}</h1>`, body ? `<p>${textAsHtml(body)}</p>` : ""),
        ' class="main-point"',
      );
    },
    big_number: (slide) =>
      section(
        slide,
        join(
          `<div class="number">${escapeHtml(slideText(slide.title))}</div>`,
          `<div class="description">${textAsHtml(slideText(slide.content))}</div>`,
        ),
        ' class="big-number"',
      ),
    caption: (slide, context) => {
      const image = slideImage(slide);
      return section(
        slide,
        join(image ? img(image.ref, slide, context) : "", `<p><em>${escapeHtml(slideText(slide.title))}</em></p>`),
        ' class="caption"',
      );
    },
    blank: (slide, context) => {
      const image = slideImage(slide);
      if (!image) return section(slide, "");
      return section(
        slide,
        "",
        ` data-background-image="${escapeHtml(context.imageSrc(image.ref))}" data-background-size="cover"`,
      );
    },
  },
  fallback: (slide) =>
    section(slide, join(`<h2>${escapeHtml(slideText(slide.title))}</h2>`, textBlock(slideText(slide.content)))),
};

export type BuildRevealHtmlOptions = ImageLoaderOptions & {
  title?: string;
  theme?: string;
  /** Inline every image as a data URI. */
  embedImages?: boolean;
  /** Without embedding, copy local images here and link them relative to baseDir. */
  assetsDir?: string;
};

export function resolveRevealTheme(theme: string | undefined, log: Logger = silentLogger): RevealTheme {
  if (theme === undefined) return DEFAULT_REVEAL_THEME;
  const normalized = theme.trim().toLowerCase();
  if (isRevealTheme(normalized)) return normalized;
  log.warn("Unknown reveal.js theme, using default", {
    theme,
    fallback: DEFAULT_REVEAL_THEME,
    themes: REVEAL_THEMES.join(","),
  });
  return DEFAULT_REVEAL_THEME;
}

async function copyAsset(ref: string, options: BuildRevealHtmlOptions, assetsDir: string): Promise<string> {
  const source = resolveLocalImagePath(ref, options.baseDir);
  const target = path.join(assetsDir, path.basename(source));
  await fs.mkdir(assetsDir, { recursive: true });
  await fs.copyFile(source, target);
  return path.relative(options.baseDir, target).split(path.sep).join("/");
}

async function prepareImageSources(
  deck: readonly SlideRecord[],
  options: BuildRevealHtmlOptions,
  log: Logger,
): Promise<Map<string, string>> {
  const sources = new Map<string, string>();
  for (const ref of collectImageRefs(deck)) {
    if (isDataUri(ref)) continue;

    if (options.embedImages ?? true) {
      const loaded = await loadImage(ref, options);
      if (loaded) {
        sources.set(ref, toDataUri(loaded));
      } else {
        log.warn("Keeping image as a link", { ref });
      }
      continue;
    }

    if (options.assetsDir && !isRemoteRef(ref)) {
      try {
        sources.set(ref, await copyAsset(ref, options, options.assetsDir));
      } catch (error) {
        log.warn("Unable to copy image into assets directory, keeping link", { ref, error: errorMessage(error) });
      }
    }
  }
  return sources;
}

export function revealPageTitle(deck: readonly SlideRecord[], title?: string): string {
  if (title?.trim()) return title.trim();
  const first = deck[0]?.title?.trim();
  return first ? first : "Untitled Presentation";
}

/**
 * Render the deck as a standalone reveal.js page.
 */
export async function buildRevealHtml(deck: readonly SlideRecord[], options: BuildRevealHtmlOptions): Promise<string> {
  const log = options.logger ?? silentLogger;
  const theme = resolveRevealTheme(options.theme, log);
  const sources = await prepareImageSources(deck, options, log);

  const context: HtmlContext = { imageSrc: (ref) => sources.get(ref) ?? ref };
  const slides = renderSlides(revealDeckBackend, deck, context, log);

  const template = await loadTemplateFile(REVEAL_TEMPLATE_FILENAME);
  return fillTemplate(template, {
    TITLE: escapeHtml(revealPageTitle(deck, options.title)),
    THEME: theme,
    REVEAL_VERSION,
    SLIDES: slides.join("\n"),
  });
}

import { LAYOUT_VARIANTS } from "./enums.js";
import type { LayoutVariant } from "./enums.js";
import type { Logger } from "./logger.js";
import { recordLayoutFallback, silentLogger } from "./logger.js";

export type LayoutResolution = {
  variant: LayoutVariant;
  /** True when the identifier was unknown and `content` was substituted. */
  fallback: boolean;
  raw: string | null;
};

export type ResolveLayoutOptions = {
  /** Extra raw → raw-or-canonical mappings, applied before the alias table. */
  mappings?: Record<string, string>;
  logger?: Logger;
  slideNumber?: number;
};

// Keys are in normalized form (see normalizeLayoutKey).
const LAYOUT_ALIASES: Record<string, LayoutVariant> = {
  title: "title",
  title_slide: "title",
  title_only: "title",

  section: "section",
  section_header: "section",
  section_title: "section",
  divider: "section",

  content: "content",
  title_and_body: "content",
  body: "content",
  content_focused: "content",
  bullets: "content",
  default: "content",
  diagram: "content",
  discussion: "content",
  logistics: "content",
  closing: "content",

  two_column: "two_column",
  two_columns: "two_column",
  title_and_two_columns: "two_column",
  columns: "two_column",
  comparison: "two_column",
  image_and_text: "two_column",

  quote: "quote",

  main_point: "main_point",
  activity: "main_point",

  big_number: "big_number",
  stat: "big_number",
  statistic: "big_number",

  caption: "caption",
  caption_only: "caption",
  break: "caption",

  blank: "blank",
  background: "blank",
};

export function normalizeLayoutKey(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/[\s._-]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

export function isLayoutVariant(value: unknown): value is LayoutVariant {
  return typeof value === "string" && LAYOUT_VARIANTS.some((variant) => variant === value);
}

export function knownLayoutAliases(): Readonly<Record<string, LayoutVariant>> {
  return LAYOUT_ALIASES;
}

function lookupAlias(raw: string): LayoutVariant | null {
  const key = normalizeLayoutKey(raw);
  if (!key) return null;
  return Object.prototype.hasOwnProperty.call(LAYOUT_ALIASES, key) ? LAYOUT_ALIASES[key] ?? null : null;
}

function applyMapping(raw: string, mappings: Record<string, string> | undefined): string {
  if (!mappings) return raw;
  if (Object.prototype.hasOwnProperty.call(mappings, raw)) {
    return mappings[raw] ?? raw;
  }
  const key = normalizeLayoutKey(raw);
  for (const [from, to] of Object.entries(mappings)) {
    if (normalizeLayoutKey(from) === key) return to;
  }
  return raw;
}

/**
 * Map any layout spelling to its canonical variant. Unknown or empty
 * identifiers resolve to `content` with `fallback` set, and are counted.
 */
export function resolveLayout(raw: unknown, options: ResolveLayoutOptions = {}): LayoutResolution {
  const log = options.logger ?? silentLogger;
  const rawText = typeof raw === "string" ? raw : null;

  if (rawText !== null) {
    const variant = lookupAlias(applyMapping(rawText, options.mappings));
    if (variant) {
      return { variant, fallback: false, raw: rawText };
    }
  }

  recordLayoutFallback();
  log.warn("Unknown layout, using content", {
    layout: raw === undefined ? null : raw,
    slideNumber: options.slideNumber,
  });
  return { variant: "content", fallback: true, raw: rawText };
}

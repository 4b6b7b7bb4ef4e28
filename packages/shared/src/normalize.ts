import type { LayoutVariant } from "./enums.js";
import { InvalidSlideRecordError } from "./errors.js";
import { describeValue, isJsonValue, isRecord } from "./guards.js";
import type { JsonValue } from "./guards.js";
import { resolveLayout } from "./layouts.js";
import type { LayoutResolution } from "./layouts.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { PassThroughField, RawSlideRecord, SlideRecord, TextField } from "./schemas/slideRecord.js";

export type SlideDefaultValue = string | number | boolean | null;

export type NormalizeOptions = {
  /** field → default, applied to absent or null fields before layout inference. */
  defaults?: Record<string, SlideDefaultValue>;
  layoutMappings?: Record<string, string>;
  logger?: Logger;
};

export type NormalizedSlide = {
  record: SlideRecord;
  layout: LayoutResolution & { inferred: boolean };
};

function isMissing(value: unknown): boolean {
  return value === undefined || value === null;
}

function toText(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  return JSON.stringify(value) ?? null;
}

function passThrough(value: unknown): JsonValue {
  if (value === undefined) return null;
  return isJsonValue(value) ? value : toText(value);
}

function hasText(value: string | null): boolean {
  return value !== null && value.trim().length > 0;
}

function inferLayout(position: number, text: (field: TextField) => string | null): LayoutVariant {
  if (position === 0) return "title";
  if (hasText(text("image_url")) || hasText(text("diagram_type")) || hasText(text("chart_type"))) {
    return "two_column";
  }
  return "content";
}

function withDefaults(raw: RawSlideRecord, defaults: Record<string, SlideDefaultValue>): RawSlideRecord {
  const merged: RawSlideRecord = { ...raw };
  for (const [key, value] of Object.entries(defaults)) {
    if (isMissing(merged[key])) merged[key] = value;
  }
  return merged;
}

function normalizeOne(
  raw: RawSlideRecord,
  position: number,
  options: NormalizeOptions,
  log: Logger,
): NormalizedSlide {
  const source = withDefaults(raw, options.defaults ?? {});
  const slideNumber = position + 1;

  const declaredNumber = source.slide_number;
  if (!isMissing(declaredNumber) && Number(declaredNumber) !== slideNumber) {
    log.debug("Slide number differs from position, renumbering", {
      declared: declaredNumber,
      slideNumber,
    });
  }

  const text = (field: TextField): string | null => toText(source[field]);
  const kept = (field: PassThroughField): JsonValue => passThrough(source[field]);

  const rawLayout = source.layout;
  let layout: NormalizedSlide["layout"];
  if (isMissing(rawLayout) || (typeof rawLayout === "string" && rawLayout.trim() === "")) {
    const variant = inferLayout(position, text);
    layout = { variant, fallback: false, raw: null, inferred: true };
  } else {
    const resolution = resolveLayout(rawLayout, {
      mappings: options.layoutMappings,
      logger: log,
      slideNumber,
    });
    layout = { ...resolution, inferred: false };
  }

  const record: SlideRecord = {
    slide_number: slideNumber,
    title: text("title"),
    content: text("content"),
    layout: layout.variant,
    chart_type: text("chart_type"),
    diagram_type: text("diagram_type"),
    diagram_content: text("diagram_content"),
    image_description: kept("image_description"),
    image_url: text("image_url"),
    facilitator_notes: text("facilitator_notes"),
    start_time: kept("start_time"),
    end_time: kept("end_time"),
    materials: kept("materials"),
    worksheet: kept("worksheet"),
    improvements: kept("improvements"),
    notes: kept("notes"),
  };

  return { record, layout };
}

/**
 * Same as normalizeSlides, but also reports how each layout was obtained.
 */
export function normalizeSlidesDetailed(
  raw: readonly unknown[],
  options: NormalizeOptions = {},
): NormalizedSlide[] {
  const log = options.logger ?? silentLogger;

  // Validate the whole input first so a bad record never leaves partial output.
  const records: RawSlideRecord[] = raw.map((item, index) => {
    if (!isRecord(item)) throw new InvalidSlideRecordError(index, describeValue(item));
    return item;
  });

  return records.map((record, position) => normalizeOne(record, position, options, log));
}

/**
 * Canonicalize loosely-typed slide records: one output per input, same order,
 * dense 1..N numbering, every field present in canonical order, layout
 * resolved to a canonical variant.
 */
export function normalizeSlides(raw: readonly unknown[], options: NormalizeOptions = {}): SlideRecord[] {
  return normalizeSlidesDetailed(raw, options).map((slide) => slide.record);
}

export function serializeDeck(deck: readonly SlideRecord[]): string {
  return `${JSON.stringify(deck, null, 2)}\n`;
}

import { SlideDecodeError } from "./errors.js";
import { isRecord } from "./guards.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

export type DecodeOptions = {
  /** Attempt per-record salvage when the text is not a well-formed list. */
  force?: boolean;
  logger?: Logger;
};

export type DecodeStage = "parse" | "bracketed" | "fragments";

export type DecodeResult = {
  records: unknown[];
  stage: DecodeStage;
};

const RECORD_FRAGMENT = /\{\s*"slide_number"\s*:.*?\}/gs;
const TRAILING_COMMA = /,\s*\}/g;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Accept a bare list, an object wrapping one under `slides`, or failing that
 * the first list of objects found under any key.
 */
export function extractSlideArray(value: unknown, log: Logger = silentLogger): unknown[] | null {
  if (Array.isArray(value)) return value;
  if (!isRecord(value)) return null;
  if (Array.isArray(value.slides)) return value.slides;

  for (const [key, candidate] of Object.entries(value)) {
    if (Array.isArray(candidate) && candidate.length > 0 && candidate.every(isRecord)) {
      log.info("Using slide list found under unexpected key", { key });
      return candidate;
    }
  }
  return null;
}

function bracketedSubstring(text: string): string | null {
  const start = text.indexOf("[");
  const end = text.lastIndexOf("]");
  if (start === -1 || end <= start) return null;
  return text.slice(start, end + 1);
}

function salvageFragments(text: string, log: Logger): unknown[] {
  const records: unknown[] = [];
  for (const match of text.matchAll(RECORD_FRAGMENT)) {
    const fragment = match[0].replace(TRAILING_COMMA, "}");
    const parsed = tryParse(fragment);
    if (parsed.ok && isRecord(parsed.value)) {
      records.push(parsed.value);
    } else {
      log.debug("Skipping unparseable slide fragment", { offset: match.index });
    }
  }
  return records;
}

/**
 * Decode a slide list from possibly-noisy text. Stages, in order: a plain
 * parse, the outermost `[...]` substring, and (with `force`) a per-record
 * scan for `{"slide_number": ...}` objects.
 */
export function decodeSlideListDetailed(text: string, options: DecodeOptions = {}): DecodeResult {
  const log = options.logger ?? silentLogger;

  const direct = tryParse(text.trim());
  if (direct.ok) {
    const records = extractSlideArray(direct.value, log);
    if (records) return { records, stage: "parse" };
  }

  const bracketed = bracketedSubstring(text);
  if (bracketed !== null) {
    const parsed = tryParse(bracketed);
    if (parsed.ok && Array.isArray(parsed.value)) {
      log.debug("Decoded slide list from bracketed substring");
      return { records: parsed.value, stage: "bracketed" };
    }
  }

  if (options.force) {
    const records = salvageFragments(text, log);
    if (records.length > 0) {
      log.warn("Recovered slide records from malformed text", { count: records.length });
      return { records, stage: "fragments" };
    }
  }

  throw new SlideDecodeError(
    options.force
      ? "No slide records could be recovered from the input"
      : "Input is not a JSON slide list (retry with force to salvage individual records)",
  );
}

export function decodeSlideList(text: string, options: DecodeOptions = {}): unknown[] {
  return decodeSlideListDetailed(text, options).records;
}

import fs from "node:fs/promises";
import path from "node:path";

import { contentTypeForPath, isRemoteRef } from "@guidedeck/assets";
import type { ImageStore } from "@guidedeck/assets";
import { errorMessage, silentLogger } from "@guidedeck/shared";
import type { Logger } from "@guidedeck/shared";

import { escapeRegExp } from "../escape.js";
import { isDataUri, resolveLocalImagePath } from "../images.js";

export type MarkupIssueKind = "empty" | "missing_separators" | "missing_headings" | "missing_image";

export type MarkupIssue = {
  kind: MarkupIssueKind;
  message: string;
  ref?: string;
};

const IMAGE_LINK = /!\[[^\]]*\]\(([^)\s]+)\)/g;
const HEADING_LINE = /^#\s+.+/m;
const SEPARATOR_LINE = /^---[ \t]*$/m;

export function listImageRefs(markup: string): string[] {
  const refs = new Set<string>();
  for (const match of markup.matchAll(IMAGE_LINK)) {
    const ref = match[1];
    if (ref) refs.add(ref);
  }
  return [...refs];
}

function isLocalRef(ref: string): boolean {
  return !isRemoteRef(ref) && !isDataUri(ref);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check deck markup before handing it to md2gslides. Missing separators and
 * headings are repairable with repairDeckMarkup; missing images are reported only.
 */
export async function validateDeckMarkup(markup: string, options: { baseDir: string }): Promise<MarkupIssue[]> {
  if (!markup.trim()) {
    return [{ kind: "empty", message: "Markup is empty" }];
  }

  const issues: MarkupIssue[] = [];
  if (!SEPARATOR_LINE.test(markup) && markup.trim().split("\n").length > 6) {
    issues.push({ kind: "missing_separators", message: "Markup has no slide separators (---)" });
  }
  if (!HEADING_LINE.test(markup)) {
    issues.push({ kind: "missing_headings", message: "Markup has no slide headings (# Title)" });
  }

  for (const ref of listImageRefs(markup)) {
    if (!isLocalRef(ref)) continue;
    if (!(await fileExists(resolveLocalImagePath(ref, options.baseDir)))) {
      issues.push({ kind: "missing_image", message: `Image not found: ${ref}`, ref });
    }
  }
  return issues;
}

export function isRepairable(issues: readonly MarkupIssue[]): boolean {
  return issues.some((issue) => issue.kind === "missing_separators" || issue.kind === "missing_headings");
}

function insertSeparators(markup: string): string {
  const out: string[] = [];
  let seenHeading = false;
  for (const line of markup.split("\n")) {
    if (line.startsWith("#")) {
      if (seenHeading && !(out[out.length - 1] ?? "").startsWith("---")) out.push("---");
      seenHeading = true;
    }
    out.push(line);
  }
  return out.join("\n");
}

/**
 * Put a separator before every heading after the first (when the markup has
 * none) and give headless slides a `# Slide N` heading.
 */
export function repairDeckMarkup(markup: string, logger: Logger = silentLogger): string {
  let text = markup.replace(/\r\n/g, "\n");
  if (!SEPARATOR_LINE.test(text)) {
    logger.info("Adding slide separators to markup");
    text = insertSeparators(text);
  }

  const slides = text
    .split(/^---[ \t]*$/m)
    .map((section) => section.trim())
    .filter((section) => section.length > 0)
    .map((section, index) => {
      if (HEADING_LINE.test(section)) return section;
      logger.info("Adding missing heading", { slide: index + 1 });
      return `# Slide ${index + 1}\n\n${section}`;
    });

  return slides.map((section) => `---\n\n${section}\n`).join("\n");
}

export type RewriteImageLinksOptions = {
  /** Directory the markup lives in; lets absolute keys match relative links. */
  baseDir?: string;
};

/**
 * Swap local image references for remote URLs. Each key matches its full
 * path, its path relative to baseDir, its basename and `images/<basename>`.
 */
export function rewriteImageLinks(
  markup: string,
  replacements: Readonly<Record<string, string>>,
  options: RewriteImageLinksOptions = {},
): { markup: string; replaced: number } {
  let out = markup;
  let replaced = 0;

  for (const [localRef, remoteUrl] of Object.entries(replacements)) {
    const basename = path.basename(localRef);
    const variants = new Set([localRef, basename, `images/${basename}`]);
    if (options.baseDir && path.isAbsolute(localRef)) {
      variants.add(path.relative(options.baseDir, localRef).split(path.sep).join("/"));
    }

    for (const variant of variants) {
      const pattern = new RegExp(`!\\[([^\\]]*)\\]\\(${escapeRegExp(variant)}\\)`, "g");
      out = out.replace(pattern, (_match, alt: string) => {
        replaced += 1;
        return `![${alt}](${remoteUrl})`;
      });
    }
  }

  return { markup: out, replaced };
}

export type PublishLocalImagesOptions = {
  baseDir: string;
  store: ImageStore;
  logger?: Logger;
};

/**
 * Upload every local image the markup references and point the links at the
 * returned URLs. Images that cannot be read or uploaded keep their local link.
 */
export async function publishLocalImages(
  markup: string,
  options: PublishLocalImagesOptions,
): Promise<{ markup: string; published: Record<string, string> }> {
  const log = options.logger ?? silentLogger;
  const published: Record<string, string> = {};

  for (const ref of listImageRefs(markup)) {
    if (!isLocalRef(ref)) continue;
    const filePath = resolveLocalImagePath(ref, options.baseDir);
    try {
      const bytes = await fs.readFile(filePath);
      published[ref] = await options.store.upload(bytes, {
        filename: path.basename(filePath),
        contentType: contentTypeForPath(filePath),
      });
      log.info("Published image", { ref, url: published[ref] });
    } catch (error) {
      log.warn("Unable to publish image, keeping local link", { ref, error: errorMessage(error) });
    }
  }

  const result = rewriteImageLinks(markup, published);
  const remaining = listImageRefs(result.markup).filter(isLocalRef);
  if (remaining.length > 0) {
    log.warn("Local image references remain", { count: remaining.length, refs: remaining.slice(0, 5) });
  }
  return { markup: result.markup, published };
}

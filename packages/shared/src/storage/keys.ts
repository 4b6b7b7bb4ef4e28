import path from "node:path";

function normalizeExtension(extension: string): string {
  const ext = extension.startsWith(".") ? extension.slice(1) : extension;
  return ext.toLowerCase() || "bin";
}

export function sanitizeFilename(filename: string): string {
  const base = path.basename(filename);
  return base.replaceAll("..", ".").replaceAll("/", "_").replaceAll("\\", "_");
}

/** Content-addressed key, so re-publishing the same bytes is a no-op. */
export function buildImageObjectKey(params: { contentHash: string; extension: string }): string {
  return `images/${params.contentHash}.${normalizeExtension(params.extension)}`;
}

export function buildCachedImageFilename(params: { urlHash: string; extension: string }): string {
  return `img_${params.urlHash.slice(0, 10)}.${normalizeExtension(params.extension)}`;
}

export function buildCachedDiagramFilename(params: { sourceHash: string; extension: string }): string {
  return `diagram_${params.sourceHash}.${normalizeExtension(params.extension)}`;
}

export function kindSlug(kind: string): string {
  const slug = kind
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return slug || "diagram";
}

export function buildDiagramOutputFilename(params: {
  sourceStem: string;
  slideNumber: number;
  kind: string;
  extension?: string;
}): string {
  const stem = sanitizeFilename(params.sourceStem);
  const ext = normalizeExtension(params.extension ?? "png");
  return `${stem}_slide${params.slideNumber}_${kindSlug(params.kind)}.${ext}`;
}

export function buildDeckOutputFilenames(sourceStem: string): {
  slides: string;
  markdown: string;
  pptx: string;
  html: string;
} {
  const stem = sanitizeFilename(sourceStem);
  return {
    slides: `slides_${stem}.json`,
    markdown: `${stem}.md`,
    pptx: `${stem}.pptx`,
    html: `${stem}.html`,
  };
}

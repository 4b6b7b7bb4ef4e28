import { diagramKindOf, extractBullets, splitContentIntoColumns } from "@guidedeck/shared";
import type { SlideRecord } from "@guidedeck/shared";

export type SlideImage = {
  ref: string;
  /** Diagram images sit beside the text; photos may replace a text block. */
  diagram: boolean;
};

export type TwoColumnParts = {
  left: string;
  right: string;
  image: SlideImage | null;
  /** A non-diagram image takes the place of the right block. */
  imageReplacesRight: boolean;
};

export function isDiagramImage(ref: string, slide?: Pick<SlideRecord, "diagram_type" | "chart_type">): boolean {
  if (slide && diagramKindOf(slide)) return true;
  const lower = ref.toLowerCase();
  return lower.includes("diagram") || lower.endsWith(".mmd.png") || lower.split(/[\\/]/).includes("diagrams");
}

export function slideImage(slide: SlideRecord): SlideImage | null {
  const ref = slide.image_url?.trim();
  if (!ref) return null;
  return { ref, diagram: isDiagramImage(ref, slide) };
}

export function slideText(value: string | null): string {
  return value ?? "";
}

export function slideBullets(slide: SlideRecord): string[] {
  return extractBullets(slide.content);
}

export function twoColumnParts(slide: SlideRecord): TwoColumnParts {
  const [left, right] = splitContentIntoColumns(slide.content);
  const image = slideImage(slide);
  return { left, right, image, imageReplacesRight: image !== null && !image.diagram };
}

export function slideNotes(slide: SlideRecord): string | null {
  const notes = slide.facilitator_notes?.trim();
  return notes ? notes : null;
}

export function collectImageRefs(deck: readonly SlideRecord[]): string[] {
  const refs = new Set<string>();
  for (const slide of deck) {
    const image = slideImage(slide);
    if (image) refs.add(image.ref);
  }
  return [...refs];
}

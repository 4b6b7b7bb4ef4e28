import PptxGenJS from "pptxgenjs";

import { extractBullets, silentLogger } from "@guidedeck/shared";
import type { Logger, SlideRecord } from "@guidedeck/shared";

import { renderSlides } from "../dispatch.js";
import type { SlideBackend } from "../dispatch.js";
import { loadImage, toDataUri } from "../images.js";
import type { ImageLoaderOptions } from "../images.js";
import { collectImageRefs, slideBullets, slideImage, slideNotes, slideText, twoColumnParts } from "../slideParts.js";

export const PPTX_CONTENT_TYPE = "application/vnd.openxmlformats-officedocument.presentationml.presentation";

// LAYOUT_16x9 is 10 x 5.625 inches.
const SLIDE_W = 10;
const SLIDE_H = 5.625;
const FONT_FACE = "Calibri";
const BAR_H = 0.625;

export type PptxPalette = {
  primary: string;
  secondary: string;
  accent: string;
};

export const DEFAULT_PALETTE: PptxPalette = {
  primary: "0078D4",
  secondary: "333333",
  accent: "FFB900",
};

type Box = { x: number; y: number; w: number; h: number };

export type PptxItem =
  | { kind: "text"; text: string | PptxGenJS.TextProps[]; options: PptxGenJS.TextPropsOptions }
  | { kind: "image"; ref: string; box: Box }
  | { kind: "bar"; box: Box; color: string };

/** Drawing operations for one slide; applied once every image is loaded. */
export type PptxSlidePlan = {
  items: PptxItem[];
  notes: string | null;
};

export type PptxContext = {
  palette: PptxPalette;
};

const HEADING_BOX: Box = { x: 0.5, y: 0.3, w: 9, h: 0.8 };
const BODY_TOP = 1.25;

function plan(slide: SlideRecord, items: Array<PptxItem | null>): PptxSlidePlan {
  return {
    items: items.filter((item): item is PptxItem => item !== null),
    notes: slideNotes(slide),
  };
}

function text(value: string, box: Box, options: PptxGenJS.TextPropsOptions): PptxItem {
  return { kind: "text", text: value, options: { fontFace: FONT_FACE, ...box, ...options } };
}

function headingItem(slide: SlideRecord, context: PptxContext): PptxItem {
  return text(slideText(slide.title), HEADING_BOX, {
    fontSize: 32,
    bold: true,
    color: context.palette.primary,
    valign: "middle",
  });
}

function bulletItem(bullets: string[], box: Box, fontSize: number, context: PptxContext): PptxItem | null {
  if (bullets.length === 0) return null;
  return {
    kind: "text",
    text: bullets.map((bullet) => ({ text: bullet, options: { bullet: true, breakLine: true } })),
    options: { fontFace: FONT_FACE, ...box, fontSize, color: context.palette.secondary, valign: "top" },
  };
}

function imageItem(ref: string | undefined, box: Box): PptxItem | null {
  return ref ? { kind: "image", ref, box } : null;
}

export const deckPptxBackend: SlideBackend<PptxSlidePlan, PptxContext> = {
  name: "pptx",
  layouts: {
    title: (slide, context) =>
      plan(slide, [
        text(slideText(slide.title), { x: 0.5, y: 1.5, w: 9, h: 1.2 }, {
          fontSize: 44,
          bold: true,
          color: context.palette.primary,
          align: "center",
        }),
        text(slideText(slide.content), { x: 0.5, y: 2.8, w: 9, h: 1.0 }, {
          fontSize: 24,
          color: context.palette.secondary,
          align: "center",
        }),
      ]),
    section: (slide, context) =>
      plan(slide, [
        text(slideText(slide.title), { x: 0.5, y: 1.6, w: 9, h: 1.5 }, {
          fontSize: 54,
          bold: true,
          color: context.palette.primary,
          align: "center",
          valign: "middle",
        }),
        { kind: "bar", box: { x: 0, y: SLIDE_H - BAR_H, w: SLIDE_W, h: BAR_H }, color: context.palette.accent },
      ]),
    content: (slide, context) => {
      const image = slideImage(slide);
      const bodyWidth = image ? 5.3 : 9;
      return plan(slide, [
        headingItem(slide, context),
        bulletItem(slideBullets(slide), { x: 0.5, y: BODY_TOP, w: bodyWidth, h: 4 }, 18, context),
        imageItem(image?.ref, { x: 6, y: 2.6, w: 3.5, h: 2.5 }),
      ]);
    },
    two_column: (slide, context) => {
      const parts = twoColumnParts(slide);
      const left = bulletItem(extractBullets(parts.left), { x: 0.5, y: BODY_TOP, w: 4.4, h: 4 }, 16, context);
      if (parts.imageReplacesRight) {
        return plan(slide, [headingItem(slide, context), left, imageItem(parts.image?.ref, { x: 5.1, y: BODY_TOP, w: 4.4, h: 4 })]);
      }
      const diagram = parts.image;
      return plan(slide, [
        headingItem(slide, context),
        left,
        bulletItem(extractBullets(parts.right), { x: 5.1, y: BODY_TOP, w: 4.4, h: diagram ? 1.7 : 4 }, 16, context),
        imageItem(diagram?.ref, { x: 5.1, y: 3.05, w: 4.4, h: 2.2 }),
      ]);
    },
    quote: (slide, context) => {
      const attribution = slideText(slide.title).trim();
      return plan(slide, [
        text(`"${slideText(slide.content).trim()}"`, { x: 1, y: 1.3, w: 8, h: 2 }, {
          fontSize: 32,
          italic: true,
          color: context.palette.primary,
          align: "center",
          valign: "middle",
        }),
        attribution
          ? text(`— ${attribution}`, { x: 1, y: 3.6, w: 8, h: 0.7 }, {
              fontSize: 18,
              color: context.palette.secondary,
              align: "center",
            })
          : null,
      ]);
    },
    main_point: (slide, context) => {
      const body = slideText(slide.content).trim();
      return plan(slide, [
        text(slideText(slide.title), { x: 0.5, y: 1.2, w: 9, h: 2.2 }, {
          fontSize: 60,
          bold: true,
          color: context.palette.primary,
          align: "center",
          valign: "middle",
        }),
        body
          ? text(body, { x: 0.5, y: 3.7, w: 9, h: 1.1 }, { fontSize: 20, color: context.palette.secondary, align: "center" })
          : null,
      ]);
    },
    big_number: (slide, context) =>
      plan(slide, [
        text(slideText(slide.title), { x: 0.5, y: 0.8, w: 9, h: 2.2 }, {
          fontSize: 88,
          bold: true,
          color: context.palette.accent,
          align: "center",
          valign: "middle",
        }),
        text(slideText(slide.content), { x: 0.5, y: 3.2, w: 9, h: 1.3 }, {
          fontSize: 24,
          color: context.palette.secondary,
          align: "center",
        }),
      ]),
    caption: (slide, context) =>
      plan(slide, [
        imageItem(slideImage(slide)?.ref, { x: 1, y: 0.3, w: 8, h: 4.2 }),
        text(slideText(slide.title), { x: 1, y: 4.65, w: 8, h: 0.7 }, {
          fontSize: 20,
          color: context.palette.secondary,
          align: "center",
        }),
      ]),
    blank: (slide) => plan(slide, [imageItem(slideImage(slide)?.ref, { x: 0, y: 0, w: SLIDE_W, h: SLIDE_H })]),
  },
  fallback: (slide, context) =>
    plan(slide, [
      headingItem(slide, context),
      text(slideText(slide.content), { x: 0.5, y: BODY_TOP, w: 9, h: 4 }, {
        fontSize: 18,
        color: context.palette.secondary,
        valign: "top",
      }),
    ]),
};

export type BuildDeckPptxOptions = ImageLoaderOptions & {
  title?: string;
  palette?: PptxPalette;
};

function applyPlan(pptx: PptxGenJS, slidePlan: PptxSlidePlan, images: Map<string, string>, log: Logger): void {
  const slide = pptx.addSlide();
  slide.background = { color: "FFFFFF" };

  for (const item of slidePlan.items) {
    switch (item.kind) {
      case "text":
        slide.addText(item.text, item.options);
        break;
      case "bar":
        slide.addShape(pptx.ShapeType.rect, { ...item.box, fill: { color: item.color }, line: { color: item.color } });
        break;
      case "image": {
        const data = images.get(item.ref);
        if (!data) {
          log.warn("Skipping image that could not be loaded", { ref: item.ref });
          break;
        }
        slide.addImage({ data, ...item.box, sizing: { type: "contain", w: item.box.w, h: item.box.h } });
        break;
      }
      default: {
        const exhaustive: never = item;
        throw new Error(`Unhandled PPTX item ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  if (slidePlan.notes) slide.addNotes(slidePlan.notes);
}

function toBytes(output: unknown): Uint8Array {
  if (output instanceof Uint8Array) return new Uint8Array(output);
  if (output instanceof ArrayBuffer) return new Uint8Array(output);
  throw new Error("pptxgenjs returned an unexpected output type");
}

/**
 * Build a PPTX with every image embedded. Images are loaded up front; one that
 * cannot be loaded is skipped with a warning.
 */
export async function buildDeckPptxBytes(
  deck: readonly SlideRecord[],
  options: BuildDeckPptxOptions,
): Promise<Uint8Array> {
  const log = options.logger ?? silentLogger;

  const images = new Map<string, string>();
  for (const ref of collectImageRefs(deck)) {
    const loaded = await loadImage(ref, options);
    // pptxgenjs takes "<mime>;base64,<data>" without the data: scheme.
    if (loaded) images.set(ref, toDataUri(loaded).slice("data:".length));
  }

  const context: PptxContext = { palette: options.palette ?? DEFAULT_PALETTE };
  const plans = renderSlides(deckPptxBackend, deck, context, log);

  const pptx = new PptxGenJS();
  pptx.layout = "LAYOUT_16x9";
  if (options.title) pptx.title = options.title;
  for (const slidePlan of plans) applyPlan(pptx, slidePlan, images, log);

  return toBytes(await pptx.write({ outputType: "nodebuffer" }));
}

import { z } from "zod";

import { LAYOUT_VARIANTS } from "../enums.js";
import type { SlideField } from "../enums.js";
import type { JsonValue } from "../guards.js";

const NullableText = z.string().nullable();

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);

export const LayoutVariantSchema = z.enum(LAYOUT_VARIANTS);

export const SlideRecordSchema = z
  .object({
    slide_number: z.number().int().min(1),
    title: NullableText,
    content: NullableText,
    layout: LayoutVariantSchema,
    chart_type: NullableText,
    diagram_type: NullableText,
    diagram_content: NullableText,
    image_description: JsonValueSchema,
    image_url: NullableText,
    facilitator_notes: NullableText,
    start_time: JsonValueSchema,
    end_time: JsonValueSchema,
    materials: JsonValueSchema,
    worksheet: JsonValueSchema,
    improvements: JsonValueSchema,
    notes: JsonValueSchema,
  })
  .strict();

export type SlideRecord = z.infer<typeof SlideRecordSchema>;
export type Deck = SlideRecord[];

/** Loosely-typed record as produced by an LLM or a hand-edited file. */
export type RawSlideRecord = Record<string, unknown>;

export const DeckSchema = z.array(SlideRecordSchema);

/** Fields copied through untouched; they never influence rendering. */
export const PASS_THROUGH_FIELDS = [
  "image_description",
  "start_time",
  "end_time",
  "materials",
  "worksheet",
  "improvements",
  "notes",
] as const satisfies readonly SlideField[];

export type PassThroughField = (typeof PASS_THROUGH_FIELDS)[number];

/** Fields renderers read as text. */
export type TextField = Exclude<SlideField, "slide_number" | "layout" | PassThroughField>;

/**
 * Schema of the structured-output request for guide extraction. Mirrors the
 * slide record with a free-form layout string.
 */
export const ExtractedSlideSchema = z.object({
  slide_number: z.number().int(),
  title: z.string(),
  content: z.string(),
  layout: z.string(),
  chart_type: NullableText,
  diagram_type: NullableText,
  diagram_content: NullableText,
  image_description: NullableText,
  image_url: NullableText,
  facilitator_notes: NullableText,
  start_time: NullableText,
  end_time: NullableText,
  materials: NullableText,
  worksheet: NullableText,
  improvements: NullableText,
  notes: NullableText,
});

export const GenerateSlidesSchema = z.object({
  slides: z.array(ExtractedSlideSchema),
});

export function diagramKindOf(slide: Pick<SlideRecord, "diagram_type" | "chart_type">): string | null {
  return slide.diagram_type ?? slide.chart_type ?? null;
}

export const LAYOUT_VARIANTS = [
  "title",
  "section",
  "content",
  "two_column",
  "quote",
  "main_point",
  "big_number",
  "caption",
  "blank",
] as const;
export type LayoutVariant = (typeof LAYOUT_VARIANTS)[number];

// Order is significant: canonical records are always serialized in this order.
export const SLIDE_FIELDS = [
  "slide_number",
  "title",
  "content",
  "layout",
  "chart_type",
  "diagram_type",
  "diagram_content",
  "image_description",
  "image_url",
  "facilitator_notes",
  "start_time",
  "end_time",
  "materials",
  "worksheet",
  "improvements",
  "notes",
] as const;
export type SlideField = (typeof SLIDE_FIELDS)[number];

export const ASSET_GROUPS = ["images", "diagrams"] as const;
export type AssetGroup = (typeof ASSET_GROUPS)[number];

export const OUTPUT_FORMATS = ["markdown", "pptx", "html"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const REVEAL_THEMES = [
  "black",
  "white",
  "league",
  "beige",
  "sky",
  "night",
  "serif",
  "simple",
  "solarized",
  "moon",
] as const;
export type RevealTheme = (typeof REVEAL_THEMES)[number];

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

import { z } from "zod";

import { LOG_LEVELS, OUTPUT_FORMATS, REVEAL_THEMES } from "../enums.js";

const SlideDefaultValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const DeckConfigSchema = z.object({
  prompt_template: z.string().default("{{content}}"),
  layout_mappings: z.record(z.string(), z.string()).default({}),
  slide_defaults: z.record(z.string(), SlideDefaultValue).default({}),
  cache_dir: z.string().min(1).optional(),
  images_dir: z.string().min(1).default("images"),
  formats: z.array(z.enum(OUTPUT_FORMATS)).min(1).default(["markdown", "pptx", "html"]),
  prefer_svg: z.boolean().default(false),
  embed_images: z.boolean().default(true),
  reveal_theme: z.string().default("black"),
  log_level: z.enum(LOG_LEVELS).default("info"),
  mermaid_config: z.string().min(1).optional(),
  model: z.string().min(1).default("gpt-4.1"),
  force_json: z.boolean().default(false),
});

export type DeckConfig = z.infer<typeof DeckConfigSchema>;
export type DeckConfigInput = z.input<typeof DeckConfigSchema>;

export function isRevealTheme(value: string): value is (typeof REVEAL_THEMES)[number] {
  return REVEAL_THEMES.some((theme) => theme === value);
}

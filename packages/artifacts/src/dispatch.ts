import { errorMessage, recordSlideRenderFallback, silentLogger } from "@guidedeck/shared";
import type { LayoutVariant, Logger, SlideRecord } from "@guidedeck/shared";

export type SlideBuilder<TSlide, TContext> = (slide: SlideRecord, context: TContext) => TSlide;

/**
 * A format backend: one construction function per canonical layout, plus the
 * heading-and-body rendering used when a construction function throws.
 */
export type SlideBackend<TSlide, TContext> = {
  name: string;
  layouts: Record<LayoutVariant, SlideBuilder<TSlide, TContext>>;
  fallback: (slide: SlideRecord, context: TContext) => TSlide;
};

export function renderSlides<TSlide, TContext>(
  backend: SlideBackend<TSlide, TContext>,
  deck: readonly SlideRecord[],
  context: TContext,
  logger: Logger = silentLogger,
): TSlide[] {
  return deck.map((slide) => {
    const build = backend.layouts[slide.layout];
    try {
      return build(slide, context);
    } catch (error) {
      recordSlideRenderFallback();
      logger.error("Slide construction failed, rendering heading and body only", {
        backend: backend.name,
        slideNumber: slide.slide_number,
        layout: slide.layout,
        error: errorMessage(error),
      });
      return backend.fallback(slide, context);
    }
  });
}

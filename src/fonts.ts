import serifRoman from "./metrics/serif-roman.json";
import type {
  Extents,
  Font,
  FontMetrics,
  FontProvider,
} from "./interfaces/Font";

export const PT_PER_INCH = 72;

export const DEFAULT_FONT = "serif-roman";

export class FontError extends Error {
  fontName: string;
  size: number;

  constructor(fontName: string, size: number, reason: string) {
    super(`Cannot load font ${fontName} at ${size}pt: ${reason}`);
    this.name = "FontError";
    this.fontName = fontName;
    this.size = size;
  }
}

/**
 * A font at a fixed point size, measured from per-glyph advance widths.
 * Kerning is not applied.
 */
export class MetricFont implements Font {
  readonly name: string;
  readonly size: number;
  private readonly metrics: FontMetrics;

  constructor(name: string, size: number, metrics: FontMetrics) {
    this.name = name;
    this.size = size;
    this.metrics = metrics;
  }

  extents(): Extents {
    const ascent = (this.metrics.ascender * this.size) / 1000;
    const descent = (this.metrics.descender * this.size) / 1000;
    return { ascent, descent, lineHeight: ascent - descent };
  }

  width(text: string): number {
    let units = 0;
    for (const ch of text) {
      units += this.metrics.widths[ch] ?? this.metrics.missingWidth;
    }
    return (units * this.size) / 1000;
  }
}

export class FontRegistry implements FontProvider {
  private metrics: Map<string, FontMetrics> = new Map<string, FontMetrics>();

  register(name: string, metrics: FontMetrics): void {
    this.metrics.set(name, metrics);
  }

  has(name: string): boolean {
    return this.metrics.has(name);
  }

  /**
   * Returns the named font at the given size, throwing a FontError if the
   * name is unknown or the size is not a positive number.
   */
  measure(name: string, size: number): Font {
    if (!Number.isFinite(size) || size <= 0) {
      throw new FontError(name, size, "size must be a positive number");
    }
    const metrics = this.metrics.get(name);
    if (!metrics) {
      throw new FontError(name, size, "no metrics registered");
    }
    return new MetricFont(name, size, metrics);
  }
}

const serifRomanMetrics: FontMetrics = serifRoman;

export const defaultFontRegistry = new FontRegistry();
defaultFontRegistry.register(DEFAULT_FONT, serifRomanMetrics);

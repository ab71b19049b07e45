/**
 * Vertical font metrics in points. Descent is below the baseline and
 * therefore negative; lineHeight may include leading.
 */
export interface Extents {
  ascent: number;
  descent: number;
  lineHeight: number;
}

export interface Font {
  readonly name: string;
  readonly size: number; // points
  extents(): Extents;
  width(text: string): number; // points
}

export interface FontProvider {
  measure(name: string, size: number): Font;
}

/**
 * Advance widths and vertical metrics in 1/1000 em, as found in an AFM file.
 */
export interface FontMetrics {
  ascender: number;
  descender: number;
  missingWidth: number;
  widths: Record<string, number>;
}

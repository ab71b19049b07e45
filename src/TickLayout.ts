import {
  DEFAULT_FONT,
  FontError,
  PT_PER_INCH,
  defaultFontRegistry,
} from "./fonts";
import type {
  LineStyle,
  TextStyle,
  Tick,
  TickGenerator,
} from "./interfaces/Axes";
import type { TickOptions } from "./interfaces/Options";
import { err, ok } from "./result";
import type { Result } from "./result";
import { DefaultTicks, isMinor } from "./ticks";

export const defaultTickOptions: Omit<TickOptions, "generator"> = {
  length: 1 / 10,
  font: { name: DEFAULT_FONT, size: 10 },
  color: "black",
  markWidth: 1 / 64,
  fonts: defaultFontRegistry,
};

/**
 * Style and placement of the tick marks on an axis.
 */
export class TickLayout {
  labelStyle: TextStyle; // style of the tick labels
  markStyle: LineStyle; // style of the tick mark lines
  length: number; // major tick length in inches; minor ticks are half this
  generator: TickGenerator;

  constructor(
    labelStyle: TextStyle,
    markStyle: LineStyle,
    length: number,
    generator: TickGenerator
  ) {
    this.labelStyle = { ...labelStyle };
    this.markStyle = { ...markStyle };
    this.length = length;
    this.generator = generator;
  }

  /**
   * Build a tick layout from the defaults, overridden by the given options.
   */
  static create(
    options: Partial<TickOptions> = {}
  ): Result<TickLayout, FontError> {
    const opts = {
      ...defaultTickOptions,
      generator: new DefaultTicks(),
      ...options,
    };
    try {
      const font = opts.fonts.measure(opts.font.name, opts.font.size);
      return ok(
        new TickLayout(
          { color: opts.color, font },
          { color: opts.color, width: opts.markWidth },
          opts.length,
          opts.generator
        )
      );
    } catch (e) {
      if (e instanceof FontError) return err(e);
      throw e;
    }
  }

  marks(min: number, max: number): Tick[] {
    return this.generator.marks(min, max);
  }

  /**
   * Height in inches reserved for the labels of a horizontal axis: the
   * ascent of the label font if any tick is major.
   */
  labelHeight(ticks: Tick[]): number {
    for (const t of ticks) {
      if (isMinor(t)) continue;
      return this.labelStyle.font.extents().ascent / PT_PER_INCH;
    }
    return 0;
  }

  /**
   * Width in inches of the widest major tick label.
   */
  labelWidth(ticks: Tick[]): number {
    let maxWidth = 0;
    for (const t of ticks) {
      if (isMinor(t)) continue;
      const w = this.labelStyle.font.width(t.label);
      if (w > maxWidth) maxWidth = w;
    }
    return maxWidth / PT_PER_INCH;
  }

  clone(): TickLayout {
    return new TickLayout(
      this.labelStyle,
      this.markStyle,
      this.length,
      this.generator
    );
  }
}

/**
 * Like TickLayout.create, but throws if the label font cannot be loaded.
 */
export function makeTickLayout(
  options: Partial<TickOptions> = {}
): TickLayout {
  const result = TickLayout.create(options);
  if (!result.ok) throw result.error;
  return result.value;
}

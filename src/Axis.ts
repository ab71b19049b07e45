import type { DrawArea } from "./DrawArea";
import {
  DEFAULT_FONT,
  FontError,
  PT_PER_INCH,
  defaultFontRegistry,
} from "./fonts";
import type { LineStyle, TextStyle } from "./interfaces/Axes";
import type { AxisOptions } from "./interfaces/Options";
import { err, ok } from "./result";
import type { Result } from "./result";
import { TickLayout } from "./TickLayout";
import { isMinor, lengthOffset } from "./ticks";

export const defaultAxisOptions: Omit<AxisOptions, "tick"> = {
  label: "",
  font: { name: DEFAULT_FONT, size: 12 },
  color: "black",
  width: 1 / 64,
  padding: 1 / 8,
  fonts: defaultFontRegistry,
};

export class Axis {
  min: number; // minimum data value on this axis
  max: number; // maximum data value on this axis
  label: string;
  labelStyle: TextStyle; // style of the axis label
  axisStyle: LineStyle; // style of the axis line
  padding: number; // inches between the axis line and the data
  ticks: TickLayout;

  constructor(
    labelStyle: TextStyle,
    axisStyle: LineStyle,
    ticks: TickLayout,
    label: string = "",
    padding: number = defaultAxisOptions.padding
  ) {
    this.min = Infinity;
    this.max = -Infinity;
    this.label = label;
    this.labelStyle = { ...labelStyle };
    this.axisStyle = { ...axisStyle };
    this.padding = padding;
    this.ticks = ticks.clone();
  }

  /**
   * Build an axis from the defaults, overridden by the given options. The
   * range is left unset.
   */
  static create(
    options: Partial<AxisOptions> = {}
  ): Result<Axis, FontError> {
    const opts = { ...defaultAxisOptions, ...options };
    const ticks = TickLayout.create({ fonts: opts.fonts, ...opts.tick });
    if (!ticks.ok) return ticks;

    try {
      const font = opts.fonts.measure(opts.font.name, opts.font.size);
      return ok(
        new Axis(
          { color: opts.color, font },
          { color: opts.color, width: opts.width },
          ticks.value,
          opts.label,
          opts.padding
        )
      );
    } catch (e) {
      if (e instanceof FontError) return err(e);
      throw e;
    }
  }

  /**
   * Widen the range to include the given values. NaN and infinite values
   * are ignored.
   */
  include(...values: number[]): void {
    for (const v of values) {
      if (!Number.isFinite(v)) continue;
      if (v < this.min) this.min = v;
      if (v > this.max) this.max = v;
    }
  }

  isSet(): boolean {
    return (
      Number.isFinite(this.min) &&
      Number.isFinite(this.max) &&
      this.min <= this.max
    );
  }

  clone(): Axis {
    const axis = new Axis(
      this.labelStyle,
      this.axisStyle,
      this.ticks,
      this.label,
      this.padding
    );
    axis.min = this.min;
    axis.max = this.max;
    return axis;
  }

  /**
   * Transform the data value x to a horizontal drawing coordinate.
   */
  x(da: DrawArea, x: number): number {
    const p = (x - this.min) / (this.max - this.min);
    return da.min.x + p * (da.max().x - da.min.x);
  }

  /**
   * Transform the data value y to a vertical drawing coordinate.
   */
  y(da: DrawArea, y: number): number {
    const p = (y - this.min) / (this.max - this.min);
    return da.min.y + p * (da.max().y - da.min.y);
  }

  /**
   * Height in inches of the axis when drawn horizontally.
   */
  height(): number {
    let h = 0;
    if (this.label !== "") {
      h += this.labelExtent();
    }
    const marks = this.ticks.marks(this.min, this.max);
    if (marks.length > 0) {
      h += this.ticks.length + this.ticks.labelHeight(marks);
    }
    h += this.axisStyle.width / 2;
    h += this.padding;
    return h;
  }

  /**
   * Width in inches of the axis when drawn vertically.
   */
  width(): number {
    let w = 0;
    if (this.label !== "") {
      w += this.labelExtent();
    }
    const marks = this.ticks.marks(this.min, this.max);
    if (marks.length > 0) {
      const labelWidth = this.ticks.labelWidth(marks);
      if (labelWidth > 0) {
        w += labelWidth;
        // a space separates the labels from the marks
        w += this.ticks.labelStyle.font.width(" ") / PT_PER_INCH;
      }
      w += this.ticks.length;
    }
    w += this.axisStyle.width / 2;
    w += this.padding;
    return w;
  }

  /**
   * Draw the axis along the bottom of the area, label first.
   */
  drawHoriz(da: DrawArea): void {
    this.warnIfDegenerate();
    const dpi = da.dpi();
    let y = da.min.y;

    if (this.label !== "") {
      const extents = this.labelStyle.font.extents();
      da.setTextStyle(this.labelStyle);
      y += (-extents.descent / PT_PER_INCH) * dpi;
      da.text(da.center().x, y, -0.5, 0, this.label);
      y += (extents.ascent / PT_PER_INCH) * dpi;
    }

    const marks = this.ticks.marks(this.min, this.max);
    if (marks.length > 0) {
      da.setLineStyle(this.ticks.markStyle);
      da.setTextStyle(this.ticks.labelStyle);
      for (const t of marks) {
        if (isMinor(t)) continue;
        da.text(this.x(da, t.value), y, -0.5, 0, t.label);
      }
      y += this.ticks.labelHeight(marks) * dpi;

      const len = this.ticks.length * dpi;
      for (const t of marks) {
        const x = this.x(da, t.value);
        da.line([
          { x, y: y + lengthOffset(t, len) },
          { x, y: y + len },
        ]);
      }
      y += len;
    }

    da.setLineStyle(this.axisStyle);
    da.line([
      { x: da.min.x, y },
      { x: da.max().x, y },
    ]);
  }

  /**
   * Draw the axis along the left of the area. The label reads bottom to top.
   */
  drawVert(da: DrawArea): void {
    this.warnIfDegenerate();
    const dpi = da.dpi();
    let x = da.min.x;

    if (this.label !== "") {
      const extents = this.labelStyle.font.extents();
      x += (extents.ascent / PT_PER_INCH) * dpi;
      da.setTextStyle(this.labelStyle);
      da.push();
      da.rotate(Math.PI / 2);
      da.text(da.center().y, -x, -0.5, 0, this.label);
      da.pop();
      x += (-extents.descent / PT_PER_INCH) * dpi;
    }

    const marks = this.ticks.marks(this.min, this.max);
    if (marks.length > 0) {
      da.setLineStyle(this.ticks.markStyle);
      da.setTextStyle(this.ticks.labelStyle);
      const labelWidth = this.ticks.labelWidth(marks);
      if (labelWidth > 0) {
        x += labelWidth * dpi;
        x += (this.ticks.labelStyle.font.width(" ") / PT_PER_INCH) * dpi;
      }
      for (const t of marks) {
        if (isMinor(t)) continue;
        da.text(x, this.y(da, t.value), -1, -0.5, t.label + " ");
      }

      const len = this.ticks.length * dpi;
      for (const t of marks) {
        const y = this.y(da, t.value);
        da.line([
          { x: x + lengthOffset(t, len), y },
          { x: x + len, y },
        ]);
      }
      x += len;
    }

    da.setLineStyle(this.axisStyle);
    da.line([
      { x, y: da.min.y },
      { x, y: da.max().y },
    ]);
  }

  /**
   * Inches the draw routines advance past the axis label: its descent below
   * the baseline plus its ascent above it. Leading is not included.
   */
  private labelExtent(): number {
    const extents = this.labelStyle.font.extents();
    return (extents.ascent - extents.descent) / PT_PER_INCH;
  }

  private warnIfDegenerate(): void {
    if (!this.isSet() || this.min === this.max) {
      console.warn(
        `Drawing axis "${this.label}" over a degenerate range ` +
          `[${this.min}, ${this.max}].`
      );
    }
  }
}

/**
 * Like Axis.create, but throws if a font cannot be loaded.
 */
export function makeAxis(options: Partial<AxisOptions> = {}): Axis {
  const result = Axis.create(options);
  if (!result.ok) throw result.error;
  return result.value;
}

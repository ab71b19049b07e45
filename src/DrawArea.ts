import { PT_PER_INCH } from "./fonts";
import type { LineStyle, TextStyle } from "./interfaces/Axes";
import type { Canvas, Point } from "./interfaces/Canvas";
import type { Font } from "./interfaces/Font";

/**
 * A rectangular region of a canvas. All coordinates are in device dots.
 */
export class DrawArea {
  canvas: Canvas;
  min: Point; // lower-left corner
  size: Point;
  private font?: Font; // font of the last text style set

  constructor(canvas: Canvas, min: Point, size: Point) {
    this.canvas = canvas;
    this.min = { ...min };
    this.size = { ...size };
  }

  max(): Point {
    return { x: this.min.x + this.size.x, y: this.min.y + this.size.y };
  }

  center(): Point {
    return {
      x: this.min.x + this.size.x / 2,
      y: this.min.y + this.size.y / 2,
    };
  }

  dpi(): number {
    return this.canvas.dpi();
  }

  setLineStyle(style: LineStyle): void {
    this.canvas.setColor(style.color);
    this.canvas.setLineWidth(style.width * this.dpi());
  }

  setTextStyle(style: TextStyle): void {
    this.canvas.setColor(style.color);
    this.canvas.setFont(style.font);
    this.font = style.font;
  }

  /**
   * Draw text with its baseline start shifted by xAlign times its width and
   * yAlign times its ascent, so (-0.5, 0) centres the text over the point.
   */
  text(
    x: number,
    y: number,
    xAlign: number,
    yAlign: number,
    txt: string
  ): void {
    if (!this.font) {
      console.warn(`No text style set before drawing "${txt}".`);
      this.canvas.fillText(x, y, txt);
      return;
    }
    const width = (this.font.width(txt) / PT_PER_INCH) * this.dpi();
    const height = (this.font.extents().ascent / PT_PER_INCH) * this.dpi();
    this.canvas.fillText(x + xAlign * width, y + yAlign * height, txt);
  }

  line(points: Point[]): void {
    this.canvas.stroke(points);
  }

  push(): void {
    this.canvas.push();
  }

  pop(): void {
    this.canvas.pop();
  }

  rotate(radians: number): void {
    this.canvas.rotate(radians);
  }
}

import type { Color } from "./Axes";
import type { Font } from "./Font";

export interface Point {
  x: number;
  y: number;
}

/**
 * Vector drawing backend. Coordinates are device dots with y growing upward.
 */
export interface Canvas {
  setColor(color: Color): void;
  setLineWidth(width: number): void;
  setFont(font: Font): void;
  fillText(x: number, y: number, text: string): void;
  stroke(path: Point[]): void;
  push(): void;
  pop(): void;
  rotate(radians: number): void;
  dpi(): number;
}

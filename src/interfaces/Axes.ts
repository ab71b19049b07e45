import type { Font } from "./Font";

export type Color = string;

export interface TextStyle {
  color: Color;
  font: Font;
}

export interface LineStyle {
  color: Color;
  width: number; // inches
}

/**
 * A single position on the data axis. Ticks with an empty label are minor.
 */
export interface Tick {
  value: number;
  label: string;
}

/**
 * Locates the tick marks for a range of data values.
 */
export interface TickGenerator {
  marks(min: number, max: number): Tick[];
}

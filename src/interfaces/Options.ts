import type { Color, TickGenerator } from "./Axes";
import type { FontProvider } from "./Font";

export interface TickOptions {
  generator: TickGenerator;
  length: number; // major tick length in inches
  font: { name: string; size: number };
  color: Color;
  markWidth: number; // inches
  fonts: FontProvider;
}

export interface AxisOptions {
  label: string;
  font: { name: string; size: number };
  color: Color;
  width: number; // axis line width in inches
  padding: number; // inches between the axis line and the data
  fonts: FontProvider;
  tick: Partial<Omit<TickOptions, "fonts">>;
}

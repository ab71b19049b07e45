export { Axis, defaultAxisOptions, makeAxis } from "./Axis";
export { DrawArea } from "./DrawArea";
export {
  DEFAULT_FONT,
  FontError,
  FontRegistry,
  MetricFont,
  PT_PER_INCH,
  defaultFontRegistry,
} from "./fonts";
export { err, ok } from "./result";
export type { Result } from "./result";
export {
  TickLayout,
  defaultTickOptions,
  makeTickLayout,
} from "./TickLayout";
export {
  ConstantTicks,
  DefaultTicks,
  formatTickValue,
  isMinor,
  lengthOffset,
} from "./ticks";
export type {
  Color,
  LineStyle,
  TextStyle,
  Tick,
  TickGenerator,
} from "./interfaces/Axes";
export type { Canvas, Point } from "./interfaces/Canvas";
export type {
  Extents,
  Font,
  FontMetrics,
  FontProvider,
} from "./interfaces/Font";
export type { AxisOptions, TickOptions } from "./interfaces/Options";

import type { Tick, TickGenerator } from "./interfaces/Axes";

/**
 * Returns true if the tick has no label.
 */
export function isMinor(tick: Tick): boolean {
  return tick.label === "";
}

/**
 * Offset added to the start of a tick mark's line so that a minor mark is
 * half as long as a major one of the given length.
 */
export function lengthOffset(tick: Tick, length: number): number {
  return isMinor(tick) ? length / 2 : 0;
}

/**
 * Format a number with the shortest digits that round-trip, switching to
 * exponent notation ("1e+06", "2.5e-05") when the decimal exponent is below
 * -4 or at least 6.
 */
export function formatTickValue(value: number): string {
  if (Number.isNaN(value)) return "NaN";
  if (value === Infinity) return "+Inf";
  if (value === -Infinity) return "-Inf";
  if (value === 0) return Object.is(value, -0) ? "-0" : "0";

  const sign = value < 0 ? "-" : "";
  const [mantissa, exponent] = Math.abs(value).toExponential().split("e");
  const exp = Number(exponent);
  const digits = mantissa.replace(".", "");

  if (exp < -4 || exp >= 6) {
    const expDigits = String(Math.abs(exp)).padStart(2, "0");
    return `${sign}${mantissa}e${exp < 0 ? "-" : "+"}${expDigits}`;
  }

  const pointAt = exp + 1;
  if (pointAt <= 0) {
    return `${sign}0.${"0".repeat(-pointAt)}${digits}`;
  }
  if (digits.length <= pointAt) {
    return `${sign}${digits}${"0".repeat(pointAt - digits.length)}`;
  }
  return `${sign}${digits.slice(0, pointAt)}.${digits.slice(pointAt)}`;
}

/**
 * Five ticks at the quarters of the range. The ends and the middle are
 * labelled; the quarter points are minor.
 */
export class DefaultTicks implements TickGenerator {
  marks(min: number, max: number): Tick[] {
    const span = max - min;
    const mid = min + span / 2;
    return [
      { value: min, label: formatTickValue(min) },
      { value: min + span / 4, label: "" },
      { value: mid, label: formatTickValue(mid) },
      { value: min + (3 * span) / 4, label: "" },
      { value: max, label: formatTickValue(max) },
    ];
  }
}

/**
 * Always returns the same ticks, whatever the range.
 */
export class ConstantTicks implements TickGenerator {
  ticks: Tick[];

  constructor(ticks: Tick[]) {
    this.ticks = [...ticks];
  }

  marks(_min: number, _max: number): Tick[] {
    return [...this.ticks];
  }
}

import type { TimeSeries } from "../records/types";
import { mapSeries, seriesLength } from "../records/types";
import type { LengthChange } from "./equidistancing";

export type Side = "pre" | "post";

export type PaddingOptions = {
  targetLength: number;
  fillValue: number;
  side: Side;
  /** Continue the time axis on this grid step instead of filling it. */
  timeStep?: number;
};

export type PaddingResult = LengthChange & {
  series: TimeSeries;
};

const padTime = (time: number[], count: number, side: Side, step: number): number[] => {
  if (time.length === 0) {
    return Array.from({ length: count }, (_, index) => index * step);
  }
  if (side === "pre") {
    const first = time[0];
    const before = Array.from({ length: count }, (_, index) => first - (count - index) * step);
    return [...before, ...time];
  }
  const last = time[time.length - 1];
  const after = Array.from({ length: count }, (_, index) => last + (index + 1) * step);
  return [...time, ...after];
};

export const applyPadding = (series: TimeSeries, options: PaddingOptions): PaddingResult => {
  const initialLength = seriesLength(series);
  const count = options.targetLength - initialLength;
  if (count <= 0) {
    return { series, initialLength, finalLength: initialLength };
  }

  const fill = Array.from({ length: count }, () => options.fillValue);
  const padded = mapSeries(series, (values, channel) => {
    if (channel === "time" && options.timeStep !== undefined) {
      return padTime(values, count, options.side, options.timeStep);
    }
    return options.side === "pre" ? [...fill, ...values] : [...values, ...fill];
  });

  return {
    series: padded,
    initialLength,
    finalLength: options.targetLength
  };
};

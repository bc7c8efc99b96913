import type { TimeSeries } from "../records/types";
import { mapSeries, seriesLength } from "../records/types";
import type { LengthChange } from "./equidistancing";
import type { Side } from "./padding";

export type TruncatingOptions = {
  targetLength: number;
  side: Side;
};

export type TruncatingResult = LengthChange & {
  series: TimeSeries;
};

export const applyTruncating = (
  series: TimeSeries,
  options: TruncatingOptions
): TruncatingResult => {
  const initialLength = seriesLength(series);
  if (initialLength <= options.targetLength) {
    return { series, initialLength, finalLength: initialLength };
  }

  // "pre" cuts from the start and keeps the tail.
  const truncated = mapSeries(series, (values) =>
    options.side === "pre"
      ? values.slice(values.length - options.targetLength)
      : values.slice(0, options.targetLength)
  );

  return {
    series: truncated,
    initialLength,
    finalLength: options.targetLength
  };
};

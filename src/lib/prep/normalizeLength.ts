import type { TimeSeries } from "../records/types";
import { seriesLength } from "../records/types";
import type { LengthChange } from "./equidistancing";
import type { Side } from "./padding";
import { applyPadding } from "./padding";
import { applyTruncating } from "./truncating";

export type LengthOptions = {
  targetLength: number;
  fillValue: number;
  padSide: Side;
  truncateSide: Side;
  timeStep?: number;
};

export type LengthAction = "padded" | "truncated" | "unchanged";

export type NormalizeResult = LengthChange & {
  series: TimeSeries;
  action: LengthAction;
};

/** Forces a series to exactly `targetLength` samples. */
export const normalizeLength = (series: TimeSeries, options: LengthOptions): NormalizeResult => {
  const initialLength = seriesLength(series);

  if (initialLength > options.targetLength) {
    const result = applyTruncating(series, {
      targetLength: options.targetLength,
      side: options.truncateSide
    });
    return { ...result, action: "truncated" };
  }

  if (initialLength < options.targetLength) {
    const result = applyPadding(series, {
      targetLength: options.targetLength,
      fillValue: options.fillValue,
      side: options.padSide,
      timeStep: options.timeStep
    });
    return { ...result, action: "padded" };
  }

  return { series, initialLength, finalLength: initialLength, action: "unchanged" };
};

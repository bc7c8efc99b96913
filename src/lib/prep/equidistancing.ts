import { InsufficientDataError } from "../errors";
import type { TimeSeries } from "../records/types";
import { mapSeries, seriesLength } from "../records/types";

export type TrailingPolicy = "drop" | "extend";

export type EquidistancingOptions = {
  interval: number;
  trailing: TrailingPolicy;
};

export type LengthChange = {
  initialLength: number;
  finalLength: number;
};

export type EquidistancingResult = LengthChange & {
  series: TimeSeries;
};

export const DEFAULT_SAMPLING_INTERVAL = 0.0012;

// Tolerance on (tEnd - t0) / interval before it counts as a partial step.
const GRID_EPSILON = 1e-9;

/**
 * Sample indices ordered by time. Repeated timestamps keep only their first
 * occurrence in the original order.
 */
const uniqueTimeOrder = (time: number[]): number[] => {
  const order = time.map((_, index) => index).sort((a, b) => time[a] - time[b] || a - b);
  return order.filter((index, position) =>
    position === 0 ? true : time[index] !== time[order[position - 1]]
  );
};

export const buildTimeGrid = (
  start: number,
  end: number,
  interval: number,
  trailing: TrailingPolicy
): number[] => {
  const steps = (end - start) / interval;
  const fullSteps = Math.floor(steps + GRID_EPSILON);
  const hasPartialStep = steps - fullSteps > GRID_EPSILON;
  const count = fullSteps + 1 + (trailing === "extend" && hasPartialStep ? 1 : 0);
  return Array.from({ length: count }, (_, index) => start + index * interval);
};

/**
 * Linear interpolation of (time, values) at each grid point. Points outside
 * the measured range hold the nearest measured value.
 */
export const interpolateLinear = (
  grid: number[],
  time: number[],
  values: number[]
): number[] => {
  const last = time.length - 1;
  let segment = 0;
  return grid.map((t) => {
    if (t <= time[0]) {
      return values[0];
    }
    if (t >= time[last]) {
      return values[last];
    }
    while (segment < last - 1 && time[segment + 1] <= t) {
      segment += 1;
    }
    const t0 = time[segment];
    const t1 = time[segment + 1];
    const ratio = (t - t0) / (t1 - t0);
    return values[segment] + ratio * (values[segment + 1] - values[segment]);
  });
};

export const applyEquidistancing = (
  series: TimeSeries,
  options: EquidistancingOptions
): EquidistancingResult => {
  const initialLength = seriesLength(series);
  const order = uniqueTimeOrder(series.time);
  if (order.length < 2) {
    throw new InsufficientDataError(series.id, order.length);
  }

  const time = order.map((index) => series.time[index]);
  const grid = buildTimeGrid(time[0], time[time.length - 1], options.interval, options.trailing);

  const resampled = mapSeries(series, (values, channel) => {
    if (channel === "time") {
      return grid;
    }
    const sorted = order.map((index) => values[index]);
    return interpolateLinear(grid, time, sorted);
  });

  return {
    series: resampled,
    initialLength,
    finalLength: grid.length
  };
};

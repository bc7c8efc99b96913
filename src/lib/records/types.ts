export type MeasuredChannel = "torque" | "angle" | "gradient";

export type Channel = "time" | MeasuredChannel;

export const MEASURED_CHANNELS: readonly MeasuredChannel[] = ["torque", "angle", "gradient"];

export const ALL_CHANNELS = [
  "time",
  "torque",
  "angle",
  "gradient"
] as const satisfies readonly Channel[];

export type RunResult = "OK" | "NOK";

export type StepGraph = {
  time: number[];
  torque: number[];
  angle: number[];
  gradient: number[];
};

export type ScrewStep = {
  name: string;
  result?: string;
  graph: StepGraph;
};

export type RawRecord = {
  id: string;
  fileName: string;
  workpieceCode: string;
  label: RunResult;
  date?: string;
  steps: ScrewStep[];
};

export type ChannelValues = Partial<Record<MeasuredChannel, number[]>>;

export type TimeSeries = {
  id: string;
  label: RunResult;
  time: number[];
  values: ChannelValues;
};

/** Applies `transform` to the time axis and every present channel. */
export const mapSeries = (
  series: TimeSeries,
  transform: (values: number[], channel: Channel) => number[]
): TimeSeries => {
  const values: ChannelValues = {};
  MEASURED_CHANNELS.forEach((channel) => {
    const current = series.values[channel];
    if (current) {
      values[channel] = transform(current, channel);
    }
  });
  return {
    ...series,
    time: transform(series.time, "time"),
    values
  };
};

export const seriesLength = (series: TimeSeries): number => series.time.length;

import { SchemaError } from "../errors";
import type { Channel, ChannelValues, MeasuredChannel, RawRecord, TimeSeries } from "./types";
import { MEASURED_CHANNELS } from "./types";

export type StepSelection = "all" | number[];

export type CycleSelection = "all" | number[];

/**
 * Counts how often each workpiece code has been seen. The n-th run on a
 * workpiece is its n-th cycle, so records must be fed in load order.
 */
export const createCycleCounter = () => {
  const counts = new Map<string, number>();
  return (record: RawRecord): number => {
    const next = (counts.get(record.workpieceCode) ?? 0) + 1;
    counts.set(record.workpieceCode, next);
    return next;
  };
};

export const isCycleSelected = (cycle: number, cycles: CycleSelection): boolean =>
  cycles === "all" || cycles.includes(cycle);

const selectedMeasuredChannels = (channels: readonly Channel[]): MeasuredChannel[] =>
  MEASURED_CHANNELS.filter((channel) => channels.includes(channel));

/**
 * Concatenates the graphs of the selected steps (in step order) into one
 * series. Step numbers beyond the record's step count are ignored.
 */
export const buildSeries = (
  record: RawRecord,
  steps: StepSelection,
  channels: readonly Channel[]
): TimeSeries => {
  const measured = selectedMeasuredChannels(channels);
  let time: number[] = [];
  const values: ChannelValues = {};
  measured.forEach((channel) => {
    values[channel] = [];
  });

  record.steps.forEach((step, index) => {
    if (steps !== "all" && !steps.includes(index + 1)) {
      return;
    }
    const stepTime = step.graph.time;
    measured.forEach((channel) => {
      const stepValues = step.graph[channel];
      if (stepValues.length !== stepTime.length) {
        throw new SchemaError(
          record.fileName,
          `Expected ${stepTime.length} ${channel} values to match the time values, found ${stepValues.length}`,
          `tightening steps[${index}].graph.${channel} values`
        );
      }
      values[channel] = (values[channel] ?? []).concat(stepValues);
    });
    time = time.concat(stepTime);
  });

  return {
    id: record.id,
    label: record.label,
    time,
    values
  };
};

import type { ParamsInput, PipelineParams } from "../config/params";
import { resolveParams } from "../config/params";
import { isRecordError } from "../errors";
import type { Logger } from "../logging/logger";
import { createLogger, silentLogger } from "../logging/logger";
import type { Label } from "../prep/converting";
import { convertLabels } from "../prep/converting";
import { applyEquidistancing } from "../prep/equidistancing";
import type { PrepMetrics } from "../prep/metrics";
import { countLabels, createPrepMetrics, logPrepMetrics } from "../prep/metrics";
import { normalizeLength } from "../prep/normalizeLength";
import { applySplit, validateSplitRatio } from "../prep/splitting";
import { createDirectorySource } from "../records/directorySource";
import { buildSeries, createCycleCounter, isCycleSelected } from "../records/selection";
import type { Channel, RawRecord, RunResult, TimeSeries } from "../records/types";
import type { DataSource, DataSplit, Sink } from "./plugins";

export type PipelineOptions = {
  source?: DataSource;
  sink?: Sink;
  logger?: Logger;
};

export type PreparedDataset = {
  x: number[][][];
  y: Label[];
  ids: string[];
  channels: Channel[];
  metrics: PrepMetrics;
};

const describeError = (error: unknown) =>
  error instanceof Error ? { error: error.name, message: error.message } : { error: String(error) };

/** time steps × channels, channel order as configured. */
export const toFeatureMatrix = (series: TimeSeries, channels: readonly Channel[]): number[][] => {
  const columns = channels.map((channel) =>
    channel === "time" ? series.time : series.values[channel] ?? []
  );
  return series.time.map((_, step) => columns.map((column) => column[step]));
};

/**
 * Selected steps → optional resampling → fixed length. Length changes are
 * only added to `metrics` once the record made it through every stage.
 */
export const prepareRecord = (
  record: RawRecord,
  params: PipelineParams,
  metrics: PrepMetrics
): TimeSeries => {
  let series = buildSeries(record, params.tighteningSteps, params.channels);

  const equidistancing = params.equidistancing
    ? applyEquidistancing(series, {
        interval: params.samplingInterval,
        trailing: params.trailing
      })
    : null;
  if (equidistancing) {
    series = equidistancing.series;
  }

  const normalized = normalizeLength(series, {
    targetLength: params.targetLength,
    fillValue: params.fillValue,
    padSide: params.padSide,
    truncateSide: params.truncateSide,
    timeStep: params.equidistancing ? params.samplingInterval : undefined
  });

  if (equidistancing) {
    metrics.stages.equidistancing.push({
      initialLength: equidistancing.initialLength,
      finalLength: equidistancing.finalLength
    });
  }
  const change = { initialLength: normalized.initialLength, finalLength: normalized.finalLength };
  if (normalized.action === "padded") {
    metrics.stages.padding.push(change);
  }
  if (normalized.action === "truncated") {
    metrics.stages.truncating.push(change);
  }
  return normalized.series;
};

const createPipelineLogger = (params: PipelineParams, options: PipelineOptions, scope: string) =>
  params.loggingEnabled ? createLogger(scope, options.logger) : silentLogger;

const collectDataset = async (
  params: PipelineParams,
  options: PipelineOptions,
  logger: Logger
): Promise<PreparedDataset> => {
  const metrics = createPrepMetrics();
  const source =
    options.source ??
    createDirectorySource(params.dataDir, {
      filePattern: params.filePattern,
      skipInvalid: params.skipInvalid,
      concurrency: params.concurrency,
      logger: createPipelineLogger(params, options, "load-records"),
      onSkip: () => {
        metrics.skipped += 1;
      }
    });

  logger.info("start", { source: source.describe, params });

  const nextCycle = createCycleCounter();
  const x: number[][][] = [];
  const labels: RunResult[] = [];
  const ids: string[] = [];

  for await (const record of source.records()) {
    const cycle = nextCycle(record);
    if (!isCycleSelected(cycle, params.tighteningCycles)) {
      continue;
    }

    let series: TimeSeries;
    try {
      series = prepareRecord(record, params, metrics);
    } catch (error) {
      if (params.skipInvalid && isRecordError(error)) {
        metrics.skipped += 1;
        logger.warn("skipping record", { id: record.id, ...describeError(error) });
        continue;
      }
      throw error;
    }

    x.push(toFeatureMatrix(series, params.channels));
    labels.push(series.label);
    ids.push(series.id);
  }

  metrics.loaded = x.length;
  return {
    x,
    y: convertLabels(labels, params.resultFormat),
    ids,
    channels: [...params.channels],
    metrics
  };
};

/** Runs the pipeline without splitting: every prepared record with its label. */
export const loadDataset = async (
  input: ParamsInput = {},
  options: PipelineOptions = {}
): Promise<PreparedDataset> => {
  const params = resolveParams(input);
  const logger = createPipelineLogger(params, options, "load-dataset");
  try {
    const dataset = await collectDataset(params, options, logger);
    logPrepMetrics(dataset.metrics, logger);
    return dataset;
  } catch (error) {
    logger.error("fail", describeError(error));
    throw error;
  }
};

/**
 * Loads, resamples, length-normalizes and splits the records described by
 * `input` (merged over DEFAULT_PARAMS).
 *
 * @example
 * const { xTrain, xTest, yTrain, yTest } = await getData({
 *   dataDir: "data/runs",
 *   targetLength: 800,
 *   splitRatio: 0.8,
 *   seed: 42
 * });
 */
export const getData = async (
  input: ParamsInput = {},
  options: PipelineOptions = {}
): Promise<DataSplit> => {
  const params = resolveParams(input);
  validateSplitRatio(params.splitRatio);
  const logger = createPipelineLogger(params, options, "get-data");
  try {
    const dataset = await collectDataset(params, options, logger);
    logPrepMetrics(dataset.metrics, logger);

    const split = applySplit(dataset, {
      ratio: params.splitRatio,
      seed: params.seed,
      stratify: params.stratify
    });

    logger.info("split", {
      train: split.xTrain.length,
      test: split.xTest.length,
      trainLabels: countLabels(split.yTrain),
      testLabels: countLabels(split.yTest)
    });

    if (options.sink) {
      await options.sink.write(split, { channels: dataset.channels, metrics: dataset.metrics });
      logger.info("sink written", { sink: options.sink.describe });
    }

    return split;
  } catch (error) {
    logger.error("fail", describeError(error));
    throw error;
  }
};

export { DEFAULT_PARAMS, paramsSchema, resolveParams } from "./lib/config/params";
export type { ParamsInput, PipelineParams } from "./lib/config/params";
export {
  DatasetShapeError,
  InsufficientDataError,
  InvalidSplitRatioError,
  LoadError,
  ParameterValidationError,
  SchemaError,
  ScrewDataError
} from "./lib/errors";
export { createLogger, silentLogger } from "./lib/logging/logger";
export type { Logger } from "./lib/logging/logger";
export { getData, loadDataset, prepareRecord, toFeatureMatrix } from "./lib/pipeline/getData";
export type { PipelineOptions, PreparedDataset } from "./lib/pipeline/getData";
export type { DataSource, DataSplit, Sink, SinkContext } from "./lib/pipeline/plugins";
export { convertLabels, toBinaryLabel } from "./lib/prep/converting";
export type { Label, ResultFormat } from "./lib/prep/converting";
export { applyEquidistancing, DEFAULT_SAMPLING_INTERVAL } from "./lib/prep/equidistancing";
export type { TrailingPolicy } from "./lib/prep/equidistancing";
export { normalizeLength } from "./lib/prep/normalizeLength";
export { applyPadding } from "./lib/prep/padding";
export type { Side } from "./lib/prep/padding";
export { applySplit } from "./lib/prep/splitting";
export { applyTruncating } from "./lib/prep/truncating";
export { createDirectorySource } from "./lib/records/directorySource";
export { listRecordFiles, loadRecords, readRecords } from "./lib/records/loadRecords";
export { parseRecord } from "./lib/records/schema";
export type { Channel, RawRecord, RunResult, TimeSeries } from "./lib/records/types";
export { createXlsxSink } from "./lib/sinks/xlsxSink";

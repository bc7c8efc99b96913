import { z } from "zod";

import { ParameterValidationError } from "../errors";
import type { Channel } from "../records/types";
import { ALL_CHANNELS } from "../records/types";
import type { CycleSelection, StepSelection } from "../records/selection";
import type { ResultFormat } from "../prep/converting";
import { DEFAULT_SAMPLING_INTERVAL } from "../prep/equidistancing";
import type { TrailingPolicy } from "../prep/equidistancing";
import type { Side } from "../prep/padding";

export type PipelineParams = {
  dataDir: string;
  filePattern: string;
  tighteningSteps: StepSelection;
  tighteningCycles: CycleSelection;
  channels: Channel[];
  equidistancing: boolean;
  samplingInterval: number;
  trailing: TrailingPolicy;
  targetLength: number;
  fillValue: number;
  padSide: Side;
  truncateSide: Side;
  splitRatio: number;
  stratify: boolean;
  seed: number;
  skipInvalid: boolean;
  resultFormat: ResultFormat;
  concurrency: number;
  loggingEnabled: boolean;
};

export const MAX_TIGHTENING_STEP = 4;
export const MAX_TIGHTENING_CYCLE = 50;

export type DefaultParams = Readonly<
  Omit<PipelineParams, "channels"> & { channels: readonly Channel[] }
>;

const defaults: DefaultParams = {
  dataDir: "data",
  filePattern: "*.json",
  tighteningSteps: "all",
  tighteningCycles: "all",
  channels: Object.freeze<Channel[]>(["time", "torque"]),
  equidistancing: true,
  samplingInterval: DEFAULT_SAMPLING_INTERVAL,
  trailing: "extend",
  targetLength: 800,
  fillValue: 0,
  padSide: "post",
  truncateSide: "post",
  splitRatio: 0.8,
  stratify: false,
  seed: 42,
  skipInvalid: false,
  resultFormat: "binary",
  concurrency: 8,
  loggingEnabled: true
};

export const DEFAULT_PARAMS: DefaultParams = Object.freeze(defaults);

const selectionSchema = (max: number) =>
  z
    .union([
      z.literal("all"),
      z.number().int().min(1).max(max),
      z.array(z.number().int().min(1).max(max)).min(1)
    ])
    .transform((value): "all" | number[] => (typeof value === "number" ? [value] : value));

const sideSchema = z.enum(["pre", "post"]);

export const paramsSchema = z
  .object({
    dataDir: z.string().min(1).default(DEFAULT_PARAMS.dataDir),
    filePattern: z.string().min(1).default(DEFAULT_PARAMS.filePattern),
    tighteningSteps: selectionSchema(MAX_TIGHTENING_STEP).default(DEFAULT_PARAMS.tighteningSteps),
    tighteningCycles: selectionSchema(MAX_TIGHTENING_CYCLE).default(
      DEFAULT_PARAMS.tighteningCycles
    ),
    channels: z
      .array(z.enum(ALL_CHANNELS))
      .min(1)
      .refine((channels) => new Set(channels).size === channels.length, {
        message: "Channels must not repeat"
      })
      .default(() => [...DEFAULT_PARAMS.channels]),
    equidistancing: z.boolean().default(DEFAULT_PARAMS.equidistancing),
    samplingInterval: z.number().finite().positive().default(DEFAULT_PARAMS.samplingInterval),
    trailing: z.enum(["drop", "extend"]).default(DEFAULT_PARAMS.trailing),
    targetLength: z.number().int().positive().default(DEFAULT_PARAMS.targetLength),
    fillValue: z.number().finite().default(DEFAULT_PARAMS.fillValue),
    padSide: sideSchema.default(DEFAULT_PARAMS.padSide),
    truncateSide: sideSchema.default(DEFAULT_PARAMS.truncateSide),
    // Any number, NaN included; (0, 1) is enforced by validateSplitRatio.
    splitRatio: z.union([z.number(), z.nan()]).default(DEFAULT_PARAMS.splitRatio),
    stratify: z.boolean().default(DEFAULT_PARAMS.stratify),
    seed: z.number().int().default(DEFAULT_PARAMS.seed),
    skipInvalid: z.boolean().default(DEFAULT_PARAMS.skipInvalid),
    resultFormat: z.enum(["binary", "raw"]).default(DEFAULT_PARAMS.resultFormat),
    concurrency: z.number().int().positive().default(DEFAULT_PARAMS.concurrency),
    loggingEnabled: z.boolean().default(DEFAULT_PARAMS.loggingEnabled)
  })
  .strict();

export type ParamsInput = z.input<typeof paramsSchema>;

const formatIssue = (issue: z.ZodIssue): string => {
  const key = issue.path.join(".");
  return key ? `${key}: ${issue.message}` : issue.message;
};

/** Fills in defaults and validates every option; unknown keys are rejected. */
export const resolveParams = (input: unknown = {}): PipelineParams => {
  const result = paramsSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ParameterValidationError(result.error.issues.map(formatIssue));
  }
  const params: PipelineParams = result.data;
  return params;
};

import type { RunResult } from "../records/types";

export type ResultFormat = "binary" | "raw";

export type Label = number | RunResult;

/** "NOK" runs are the positive class. */
export const toBinaryLabel = (result: RunResult): number => (result === "NOK" ? 1 : 0);

export const convertLabels = (labels: RunResult[], format: ResultFormat): Label[] =>
  format === "binary" ? labels.map(toBinaryLabel) : [...labels];

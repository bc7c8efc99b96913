import type { Logger } from "../logging/logger";
import type { Label } from "./converting";
import type { LengthChange } from "./equidistancing";

export type StageName = "equidistancing" | "truncating" | "padding";

export type StageSummary = {
  records: number;
  averageInitialLength: number;
  averageFinalLength: number;
};

export type PrepMetrics = {
  loaded: number;
  skipped: number;
  stages: Record<StageName, LengthChange[]>;
};

export const createPrepMetrics = (): PrepMetrics => ({
  loaded: 0,
  skipped: 0,
  stages: {
    equidistancing: [],
    truncating: [],
    padding: []
  }
});

export const summarizeStage = (changes: LengthChange[]): StageSummary | null => {
  if (changes.length === 0) {
    return null;
  }
  const initial = changes.reduce((sum, change) => sum + change.initialLength, 0);
  const final = changes.reduce((sum, change) => sum + change.finalLength, 0);
  return {
    records: changes.length,
    averageInitialLength: initial / changes.length,
    averageFinalLength: final / changes.length
  };
};

export const countLabels = (labels: Label[]): Record<string, number> =>
  labels.reduce<Record<string, number>>((counts, label) => {
    const key = String(label);
    counts[key] = (counts[key] ?? 0) + 1;
    return counts;
  }, {});

const STAGES: readonly StageName[] = ["equidistancing", "truncating", "padding"];

const STAGE_TITLES: Record<StageName, string> = {
  equidistancing: "Equidistancing",
  truncating: "Truncating",
  padding: "Padding"
};

export const logPrepMetrics = (metrics: PrepMetrics, logger: Logger): void => {
  logger.info(`records prepared: ${metrics.loaded}, skipped: ${metrics.skipped}`);
  STAGES.forEach((stage) => {
    const summary = summarizeStage(metrics.stages[stage]);
    if (!summary) {
      return;
    }
    logger.info(
      `${STAGE_TITLES[stage]} (avg. lengths): ${summary.averageInitialLength.toFixed(2)} -> ${summary.averageFinalLength.toFixed(2)}`
    );
  });
};

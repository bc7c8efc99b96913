import { writeFile } from "fs/promises";
import * as XLSX from "xlsx";

import { ScrewDataError } from "../errors";
import type { Label } from "../prep/converting";
import type { PrepMetrics } from "../prep/metrics";
import { summarizeStage } from "../prep/metrics";
import type { Channel } from "../records/types";
import type { DataSplit, Sink, SinkContext } from "../pipeline/plugins";

type SheetRow = (string | number)[];

const MAX_SHEET_COLUMNS = 16_384;
const MAX_SHEET_ROWS = 1_048_576;

export const buildSheetHeader = (channels: readonly Channel[], steps: number): string[] => {
  const header = ["id", "label"];
  for (let step = 0; step < steps; step += 1) {
    channels.forEach((channel) => {
      header.push(`${channel}_${step}`);
    });
  }
  return header;
};

/** One row per sample; columns run step by step, channels within a step. */
export const buildSheetRows = (
  x: number[][][],
  y: Label[],
  ids: string[],
  channels: readonly Channel[]
): SheetRow[] => {
  const steps = x[0]?.length ?? 0;
  const header = buildSheetHeader(channels, steps);
  if (header.length > MAX_SHEET_COLUMNS) {
    throw new ScrewDataError(
      `A sheet row would need ${header.length} columns; XLSX allows ${MAX_SHEET_COLUMNS}.`
    );
  }
  if (x.length + 1 > MAX_SHEET_ROWS) {
    throw new ScrewDataError(`A sheet would need ${x.length + 1} rows; XLSX allows ${MAX_SHEET_ROWS}.`);
  }

  const rows = x.map((matrix, index): SheetRow => [ids[index], y[index], ...matrix.flat()]);
  return [header, ...rows];
};

const buildSummaryRows = (metrics: PrepMetrics): SheetRow[] => {
  const rows: SheetRow[] = [["stage", "records", "avg initial length", "avg final length"]];
  (["equidistancing", "truncating", "padding"] as const).forEach((stage) => {
    const summary = summarizeStage(metrics.stages[stage]);
    if (summary) {
      rows.push([stage, summary.records, summary.averageInitialLength, summary.averageFinalLength]);
    }
  });
  rows.push(["loaded", metrics.loaded, "", ""]);
  rows.push(["skipped", metrics.skipped, "", ""]);
  return rows;
};

export const buildSplitWorkbook = (split: DataSplit, context: SinkContext): XLSX.WorkBook => {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.aoa_to_sheet(buildSheetRows(split.xTrain, split.yTrain, split.idsTrain, context.channels)),
    "train"
  );
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.aoa_to_sheet(buildSheetRows(split.xTest, split.yTest, split.idsTest, context.channels)),
    "test"
  );
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.aoa_to_sheet(buildSummaryRows(context.metrics)),
    "summary"
  );
  return workbook;
};

export const createXlsxSink = (filePath: string): Sink => ({
  describe: `xlsx ${filePath}`,
  write: async (split, context) => {
    const workbook = buildSplitWorkbook(split, context);
    const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
    await writeFile(filePath, buffer);
  }
});

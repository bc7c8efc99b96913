import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  InsufficientDataError,
  InvalidSplitRatioError,
  LoadError,
  ParameterValidationError
} from "../lib/errors";
import type { Logger } from "../lib/logging/logger";
import { getData, loadDataset, toFeatureMatrix } from "../lib/pipeline/getData";
import type { DataSource, Sink } from "../lib/pipeline/plugins";
import { parseRecord } from "../lib/records/schema";
import type { RawRecord } from "../lib/records/types";
import { createTempDir, makeRun, removeTempDir, writeRuns } from "./fixtures/runs";

const shortStep = { time: [0, 1, 2], torque: [5, 6, 7], angle: [50, 60, 70] };

const createStubLogger = () => {
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const typed: Logger = logger;
  return { logger, typed };
};

describe("feature matrix", () => {
  it("lays out time steps by configured channel order", () => {
    const series = {
      id: "r",
      label: "OK" as const,
      time: [0, 1],
      values: { torque: [3, 4], angle: [8, 9] }
    };

    expect(toFeatureMatrix(series, ["angle", "time", "torque"])).toEqual([
      [8, 0, 3],
      [9, 1, 4]
    ]);
  });
});

describe("getData", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  const writeTenRuns = () =>
    writeRuns(
      dir,
      Object.fromEntries(
        Array.from({ length: 10 }, (_, index) => [
          `run-${String(index).padStart(2, "0")}.json`,
          makeRun({ code: `DMC-${index}`, result: index % 2 === 0 ? "OK" : "NOK" })
        ])
      )
    );

  it("returns fixed-shape train and test arrays", async () => {
    await writeTenRuns();

    const split = await getData({ dataDir: dir, targetLength: 6, loggingEnabled: false });

    expect(split.xTrain).toHaveLength(8);
    expect(split.xTest).toHaveLength(2);
    expect(split.yTrain).toHaveLength(8);
    expect(split.yTest).toHaveLength(2);
    [...split.xTrain, ...split.xTest].forEach((matrix) => {
      expect(matrix).toHaveLength(6);
      matrix.forEach((row) => expect(row).toHaveLength(2));
    });
    expect([...split.yTrain, ...split.yTest].sort()).toEqual([0, 0, 0, 0, 0, 1, 1, 1, 1, 1]);
    expect([...split.idsTrain, ...split.idsTest].sort()).toEqual(
      Array.from({ length: 10 }, (_, index) => `run-${String(index).padStart(2, "0")}`)
    );
  });

  it("returns the same split for the same seed", async () => {
    await writeTenRuns();

    const first = await getData({ dataDir: dir, targetLength: 4, seed: 7, loggingEnabled: false });
    const second = await getData({ dataDir: dir, targetLength: 4, seed: 7, loggingEnabled: false });

    expect(first.idsTrain).toEqual(second.idsTrain);
    expect(first.xTrain).toEqual(second.xTrain);
  });

  it("resamples then pads on the time grid", async () => {
    await writeRuns(dir, { "a.json": makeRun({ steps: [shortStep] }) });

    const dataset = await loadDataset({
      dataDir: dir,
      samplingInterval: 1,
      targetLength: 4,
      fillValue: -1,
      loggingEnabled: false
    });

    expect(dataset.x).toEqual([
      [
        [0, 5],
        [1, 6],
        [2, 7],
        [3, -1]
      ]
    ]);
    expect(dataset.y).toEqual([0]);
    expect(dataset.ids).toEqual(["a"]);
    expect(dataset.metrics.stages.equidistancing).toEqual([{ initialLength: 3, finalLength: 3 }]);
    expect(dataset.metrics.stages.padding).toEqual([{ initialLength: 3, finalLength: 4 }]);
  });

  it("pads the time channel with the fill value without resampling", async () => {
    await writeRuns(dir, { "a.json": makeRun({ result: "NOK", steps: [shortStep] }) });

    const dataset = await loadDataset({
      dataDir: dir,
      equidistancing: false,
      targetLength: 4,
      fillValue: -1,
      channels: ["time", "torque", "angle"],
      resultFormat: "raw",
      loggingEnabled: false
    });

    expect(dataset.x[0]).toEqual([
      [0, 5, 50],
      [1, 6, 60],
      [2, 7, 70],
      [-1, -1, -1]
    ]);
    expect(dataset.y).toEqual(["NOK"]);
    expect(dataset.metrics.stages.equidistancing).toEqual([]);
  });

  it("truncates long runs", async () => {
    await writeRuns(dir, { "a.json": makeRun({ steps: [shortStep] }) });

    const dataset = await loadDataset({
      dataDir: dir,
      equidistancing: false,
      targetLength: 2,
      truncateSide: "pre",
      channels: ["torque"],
      loggingEnabled: false
    });

    expect(dataset.x[0]).toEqual([[6], [7]]);
    expect(dataset.metrics.stages.truncating).toEqual([{ initialLength: 3, finalLength: 2 }]);
  });

  it("keeps only the selected cycles", async () => {
    await writeRuns(dir, {
      "1.json": makeRun({ code: "A" }),
      "2.json": makeRun({ code: "A", result: "NOK" }),
      "3.json": makeRun({ code: "B" }),
      "4.json": makeRun({ code: "A" })
    });

    const dataset = await loadDataset({
      dataDir: dir,
      tighteningCycles: 2,
      targetLength: 4,
      loggingEnabled: false
    });

    expect(dataset.ids).toEqual(["2"]);
    expect(dataset.y).toEqual([1]);
  });

  it("fails on a run too short to resample", async () => {
    await writeRuns(dir, {
      "1.json": makeRun(),
      "2.json": makeRun({ steps: [{ time: [0], torque: [1] }] })
    });

    await expect(
      loadDataset({ dataDir: dir, targetLength: 4, loggingEnabled: false })
    ).rejects.toBeInstanceOf(InsufficientDataError);
  });

  it("skips invalid runs when asked", async () => {
    await writeRuns(dir, {
      "1.json": makeRun(),
      "2.json": makeRun({ steps: [{ time: [0], torque: [1] }] }),
      "3.json": "{ nope",
      "4.json": makeRun({ result: "NOK" })
    });

    const dataset = await loadDataset({
      dataDir: dir,
      targetLength: 4,
      skipInvalid: true,
      loggingEnabled: false
    });

    expect(dataset.ids).toEqual(["1", "4"]);
    expect(dataset.metrics.loaded).toBe(2);
    expect(dataset.metrics.skipped).toBe(2);
    expect(dataset.metrics.stages.equidistancing).toHaveLength(2);
  });

  it("fails on a missing directory", async () => {
    await expect(
      getData({ dataDir: `${dir}/missing`, skipInvalid: true, loggingEnabled: false })
    ).rejects.toBeInstanceOf(LoadError);
  });

  it("cannot split an empty directory", async () => {
    await expect(getData({ dataDir: dir, loggingEnabled: false })).rejects.toThrow(
      "Cannot split an empty dataset."
    );
  });

  it("rejects invalid parameters before loading", async () => {
    await expect(getData({ dataDir: dir, targetLength: -3 })).rejects.toBeInstanceOf(
      ParameterValidationError
    );
    await expect(getData({ dataDir: dir, splitRatio: 1.5 })).rejects.toBeInstanceOf(
      InvalidSplitRatioError
    );
    await expect(getData({ dataDir: dir, splitRatio: Number.NaN })).rejects.toBeInstanceOf(
      InvalidSplitRatioError
    );
    await expect(
      getData({ dataDir: dir, splitRatio: Number.POSITIVE_INFINITY })
    ).rejects.toBeInstanceOf(InvalidSplitRatioError);
  });

  it("hands the split to a sink", async () => {
    await writeTenRuns();
    const write = vi.fn<Sink["write"]>(async () => undefined);
    const sink: Sink = { describe: "memory", write };

    const split = await getData(
      { dataDir: dir, targetLength: 4, channels: ["torque"], loggingEnabled: false },
      { sink }
    );

    expect(write).toHaveBeenCalledTimes(1);
    const [written, context] = write.mock.calls[0];
    expect(written).toBe(split);
    expect(context.channels).toEqual(["torque"]);
    expect(context.metrics.loaded).toBe(10);
  });

  it("reads from a custom data source", async () => {
    const records: RawRecord[] = [
      parseRecord("x-1.json", makeRun({ steps: [shortStep] })),
      parseRecord("x-2.json", makeRun({ result: "NOK", steps: [shortStep] }))
    ];
    const source: DataSource = {
      describe: "memory",
      records: async function* () {
        yield* records;
      }
    };

    const split = await getData(
      {
        dataDir: "does-not-matter",
        equidistancing: false,
        targetLength: 3,
        splitRatio: 0.5,
        stratify: true,
        loggingEnabled: false
      },
      { source }
    );

    expect(split.yTrain).toHaveLength(1);
    expect([...split.yTrain, ...split.yTest].sort()).toEqual([0, 1]);
    expect([...split.idsTrain, ...split.idsTest].sort()).toEqual(["x-1", "x-2"]);
  });

  it("logs progress through the given logger", async () => {
    await writeRuns(dir, { "1.json": makeRun(), "2.json": makeRun({ result: "NOK" }) });
    const { logger, typed } = createStubLogger();

    await getData(
      { dataDir: dir, targetLength: 4, splitRatio: 0.5, equidistancing: false },
      { logger: typed }
    );

    expect(logger.info).toHaveBeenCalledWith("[get-data] records prepared: 2, skipped: 0");
    expect(logger.info).toHaveBeenCalledWith("[get-data] split", {
      train: 1,
      test: 1,
      trainLabels: expect.any(Object),
      testLabels: expect.any(Object)
    });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it("logs failures before rethrowing", async () => {
    const { logger, typed } = createStubLogger();

    await expect(getData({ dataDir: dir }, { logger: typed })).rejects.toThrow(
      InvalidSplitRatioError
    );
    expect(logger.error).toHaveBeenCalledWith("[get-data] fail", {
      error: "InvalidSplitRatioError",
      message: "Cannot split an empty dataset."
    });
  });

  it("stays silent when logging is disabled", async () => {
    await writeRuns(dir, { "1.json": makeRun(), "2.json": makeRun() });
    const { logger, typed } = createStubLogger();

    await getData({ dataDir: dir, targetLength: 4, loggingEnabled: false }, { logger: typed });

    expect(logger.info).not.toHaveBeenCalled();
  });
});

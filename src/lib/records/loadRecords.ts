import { readFile, stat } from "fs/promises";
import path from "path";
import fg from "fast-glob";

import { LoadError, isRecordError } from "../errors";
import type { Logger } from "../logging/logger";
import { silentLogger } from "../logging/logger";
import { parseRecord } from "./schema";
import type { RawRecord } from "./types";

export type LoadOptions = {
  filePattern?: string;
  skipInvalid?: boolean;
  concurrency?: number;
  logger?: Logger;
  onSkip?: (error: Error) => void;
};

type FileOutcome =
  | { ok: true; record: RawRecord }
  | { ok: false; error: unknown };

const DEFAULT_PATTERN = "*.json";
const DEFAULT_CONCURRENCY = 8;

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const ensureDirectory = async (dataDir: string): Promise<void> => {
  try {
    const info = await stat(dataDir);
    if (!info.isDirectory()) {
      throw new LoadError(dataDir, "Source path is not a directory");
    }
  } catch (error) {
    if (error instanceof LoadError) {
      throw error;
    }
    throw new LoadError(dataDir, "Source directory not found", describeError(error));
  }
};

/** Relative file names under `dataDir` matching the pattern, sorted by name. */
export const listRecordFiles = async (
  dataDir: string,
  filePattern: string = DEFAULT_PATTERN
): Promise<string[]> => {
  await ensureDirectory(dataDir);
  const files = await fg(filePattern, { cwd: dataDir, onlyFiles: true, dot: false });
  return files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
};

export const readRecordFile = async (dataDir: string, fileName: string): Promise<RawRecord> => {
  let text: string;
  try {
    text = await readFile(path.join(dataDir, fileName), "utf8");
  } catch (error) {
    throw new LoadError(fileName, "Unable to read record file", describeError(error));
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new LoadError(fileName, "Malformed JSON in record file", describeError(error));
  }

  return parseRecord(fileName, json);
};

const settle = async (dataDir: string, fileName: string): Promise<FileOutcome> => {
  try {
    return { ok: true, record: await readRecordFile(dataDir, fileName) };
  } catch (error) {
    return { ok: false, error };
  }
};

/**
 * Lazily yields one record per matching file. Files are read `concurrency`
 * at a time but always yielded in sorted file order, so the first failing
 * file is the one reported.
 */
export async function* readRecords(
  dataDir: string,
  options: LoadOptions = {}
): AsyncGenerator<RawRecord> {
  const logger = options.logger ?? silentLogger;
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  const files = await listRecordFiles(dataDir, options.filePattern);

  for (let start = 0; start < files.length; start += concurrency) {
    const batch = files.slice(start, start + concurrency);
    const outcomes = await Promise.all(batch.map((fileName) => settle(dataDir, fileName)));

    for (const outcome of outcomes) {
      if (outcome.ok) {
        yield outcome.record;
        continue;
      }
      if (options.skipInvalid && isRecordError(outcome.error)) {
        logger.warn("skipping invalid record", {
          error: outcome.error.name,
          message: outcome.error.message
        });
        options.onSkip?.(outcome.error);
        continue;
      }
      throw outcome.error;
    }
  }
}

export const loadRecords = async (
  dataDir: string,
  options: LoadOptions = {}
): Promise<RawRecord[]> => {
  const records: RawRecord[] = [];
  for await (const record of readRecords(dataDir, options)) {
    records.push(record);
  }
  return records;
};

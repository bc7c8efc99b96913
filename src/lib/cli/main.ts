import { existsSync, readFileSync } from "fs";
import path from "path";

import { DEFAULT_PARAMS, resolveParams } from "../config/params";
import type { PipelineParams } from "../config/params";
import { createLogger } from "../logging/logger";
import type { Logger } from "../logging/logger";
import { getData } from "../pipeline/getData";
import { createXlsxSink } from "../sinks/xlsxSink";

export type ArgMap = Map<string, string | boolean>;

const USAGE = `Usage: screw-data-prep [options]

  --config <file>     JSON file with pipeline parameters
  --data-dir <dir>    directory of run records (default: ${DEFAULT_PARAMS.dataDir})
  --xlsx <file>       also write the split to an XLSX workbook
  --quiet             disable pipeline logging
  --help              show this message
`;

export type ParsedArgs = {
  flags: ArgMap;
  problems: string[];
};

type FlagKind = "value" | "switch";

const FLAG_KINDS = new Map<string, FlagKind>([
  ["config", "value"],
  ["data-dir", "value"],
  ["xlsx", "value"],
  ["quiet", "switch"],
  ["help", "switch"]
]);

/** Known flags go to `flags`; anything else is reported in `problems`. */
export const parseArgs = (argv: string[]): ParsedArgs => {
  const flags: ArgMap = new Map();
  const problems: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const entry = argv[i];
    if (!entry.startsWith("--")) {
      problems.push(`unexpected argument "${entry}"`);
      continue;
    }
    const key = entry.slice(2);
    const next = argv[i + 1];
    const hasValue = next !== undefined && !next.startsWith("--");
    const kind = FLAG_KINDS.get(key);

    if (kind === undefined) {
      problems.push(`unknown flag ${entry}`);
      // its value, if any, belongs to the unknown flag
      i += hasValue ? 1 : 0;
      continue;
    }
    if (kind === "switch") {
      flags.set(key, true);
      continue;
    }
    if (!hasValue) {
      problems.push(`${entry} needs a value`);
      continue;
    }
    flags.set(key, next);
    i += 1;
  }
  return { flags, problems };
};

const flagString = (flags: ArgMap, key: string): string | undefined => {
  const value = flags.get(key);
  return typeof value === "string" ? value : undefined;
};

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Config file first, then flags on top, validated against DEFAULT_PARAMS. */
export const buildParamsFromFlags = (
  flags: ArgMap,
  readConfig: (file: string) => string = (file) => readFileSync(file, "utf8")
): PipelineParams => {
  const configPath = flagString(flags, "config");
  const fromFile: unknown = configPath ? JSON.parse(readConfig(configPath)) : {};
  if (!isPlainObject(fromFile)) {
    throw new Error(`Config file ${configPath ?? ""} must contain a JSON object.`);
  }

  const params: Record<string, unknown> = { ...fromFile };
  const dataDir = flagString(flags, "data-dir");
  if (dataDir) {
    params.dataDir = dataDir;
  }
  if (flags.get("quiet") === true) {
    params.loggingEnabled = false;
  }
  return resolveParams(params);
};

export const main = async (argv: string[], logger: Logger = createLogger("screw-data-prep")) => {
  const { flags, problems } = parseArgs(argv);
  if (flags.get("help") === true) {
    process.stdout.write(USAGE);
    return 0;
  }
  if (problems.length > 0) {
    logger.error("invalid arguments", problems.join("; "));
    return 1;
  }

  let params: PipelineParams;
  try {
    params = buildParamsFromFlags(flags);
  } catch (error) {
    logger.error("invalid config", error instanceof Error ? error.message : String(error));
    return 1;
  }

  if (!existsSync(params.dataDir)) {
    logger.error(`source path ${path.resolve(params.dataDir)} does not exist`);
    return 1;
  }

  const xlsxPath = flagString(flags, "xlsx");
  try {
    const split = await getData(params, {
      sink: xlsxPath ? createXlsxSink(xlsxPath) : undefined
    });
    logger.info(
      `loaded ${split.xTrain.length} training samples and ${split.xTest.length} test samples`
    );
    return 0;
  } catch (error) {
    logger.error("pipeline failed", error instanceof Error ? error.message : String(error));
    return 1;
  }
};

import type { DataSource } from "../pipeline/plugins";
import type { LoadOptions } from "./loadRecords";
import { readRecords } from "./loadRecords";

export const createDirectorySource = (dataDir: string, options: LoadOptions = {}): DataSource => ({
  describe: `directory ${dataDir}`,
  records: () => readRecords(dataDir, options)
});

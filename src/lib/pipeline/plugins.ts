import type { Channel, RawRecord } from "../records/types";
import type { Label } from "../prep/converting";
import type { PrepMetrics } from "../prep/metrics";
import type { SplitResult } from "../prep/splitting";

export type DataSplit = SplitResult<number[][], Label>;

/** Anything that can produce raw records, in a stable order. */
export type DataSource = {
  describe: string;
  records: () => AsyncIterable<RawRecord>;
};

export type SinkContext = {
  channels: Channel[];
  metrics: PrepMetrics;
};

/** Receives the finished split, e.g. to export or monitor it. */
export type Sink = {
  describe: string;
  write: (split: DataSplit, context: SinkContext) => Promise<void>;
};

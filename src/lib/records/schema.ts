import { z } from "zod";

import { SchemaError } from "../errors";
import type { RawRecord } from "./types";

const valuesSchema = z.array(z.number().finite()).optional().default([]);

const graphSchema = z.object({
  "time values": valuesSchema,
  "torque values": valuesSchema,
  "angle values": valuesSchema,
  "gradient values": valuesSchema
});

const stepSchema = z.object({
  name: z.string().optional().default(""),
  result: z.string().optional(),
  graph: graphSchema
});

export const recordFileSchema = z.object({
  "id code": z.union([z.string().min(1), z.number()]).transform((value) => String(value)),
  result: z.enum(["OK", "NOK"]),
  date: z.string().optional(),
  "tightening steps": z.array(stepSchema).min(1)
});

/** Path relative to the data directory, without its extension. */
export const recordIdFromFileName = (fileName: string): string => {
  const normalized = fileName.replace(/\\/g, "/");
  const slash = normalized.lastIndexOf("/");
  const dot = normalized.lastIndexOf(".");
  return dot > slash + 1 ? normalized.slice(0, dot) : normalized;
};

const formatPath = (path: (string | number)[]): string =>
  path.reduce<string>((joined, segment) => {
    if (typeof segment === "number") {
      return `${joined}[${segment}]`;
    }
    return joined ? `${joined}.${segment}` : segment;
  }, "");

/**
 * Validates one parsed JSON document against the record schema. Unknown
 * fields are dropped; the first failing path is reported.
 */
export const parseRecord = (fileName: string, json: unknown): RawRecord => {
  const result = recordFileSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new SchemaError(
      fileName,
      issue?.message ?? "Record does not match the expected schema",
      issue ? formatPath(issue.path) : undefined
    );
  }

  const file = result.data;
  return {
    id: recordIdFromFileName(fileName),
    fileName,
    workpieceCode: file["id code"],
    label: file.result,
    date: file.date,
    steps: file["tightening steps"].map((step) => ({
      name: step.name,
      result: step.result,
      graph: {
        time: step.graph["time values"],
        torque: step.graph["torque values"],
        angle: step.graph["angle values"],
        gradient: step.graph["gradient values"]
      }
    }))
  };
};

export class ScrewDataError extends Error {
  details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = "ScrewDataError";
    this.details = details;
  }
}

export class LoadError extends ScrewDataError {
  file: string;

  constructor(file: string, message: string, details?: string) {
    super(`${message} (${file})`, details);
    this.name = "LoadError";
    this.file = file;
  }
}

export class SchemaError extends ScrewDataError {
  file: string;
  path?: string;

  constructor(file: string, message: string, path?: string) {
    super(path ? `${message} at "${path}" (${file})` : `${message} (${file})`);
    this.name = "SchemaError";
    this.file = file;
    this.path = path;
  }
}

export class InsufficientDataError extends ScrewDataError {
  recordId: string;
  sampleCount: number;

  constructor(recordId: string, sampleCount: number) {
    super(
      `Record ${recordId} has ${sampleCount} distinct time sample(s); at least 2 are needed to resample.`
    );
    this.name = "InsufficientDataError";
    this.recordId = recordId;
    this.sampleCount = sampleCount;
  }
}

export class InvalidSplitRatioError extends ScrewDataError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidSplitRatioError";
  }
}

export class ParameterValidationError extends ScrewDataError {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid parameters: ${issues.join("; ")}`);
    this.name = "ParameterValidationError";
    this.issues = issues;
  }
}

export class DatasetShapeError extends ScrewDataError {
  constructor(message: string) {
    super(message);
    this.name = "DatasetShapeError";
  }
}

// Errors a single record can raise; only these are skipped under skipInvalid.
export const isRecordError = (
  error: unknown
): error is LoadError | SchemaError | InsufficientDataError =>
  error instanceof LoadError ||
  error instanceof SchemaError ||
  error instanceof InsufficientDataError;

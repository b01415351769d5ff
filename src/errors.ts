export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends PipelineError {}

export class RequestError extends PipelineError {
  status: number | null;
  constructor(message: string, status: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

export class DataError extends PipelineError {}

export class SchemaError extends PipelineError {}

export class LoadError extends PipelineError {}

export class QueryError extends PipelineError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

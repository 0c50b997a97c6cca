/**
 * Error taxonomy for the ingestion and query pipelines.
 *
 * Every error raised on purpose by the service is an AppError carrying:
 * - an HTTP status code used by the global error handler
 * - the pipeline stage that failed (ingestion, embedding, retrieval, generation)
 * - whether the failure is transient and worth retrying
 */
export type AppErrorType =
  | "DomainError"
  | "InfrastructureError"
  | "AppError"
  | "ValidationError";

export type PipelineStage =
  | "request"
  | "ingestion"
  | "embedding"
  | "retrieval"
  | "generation"
  | "cache";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export interface AppErrorOptions {
  stage?: PipelineStage;
  retryable?: boolean;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly statusCode: number | undefined;
  public readonly metadata: AppErrorMetadata | undefined;
  public readonly stage: PipelineStage | undefined;
  public readonly retryable: boolean;

  constructor(
    message: string,
    type: AppErrorType = "AppError",
    statusCode?: number,
    metadata?: AppErrorMetadata,
    options: AppErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.type = type;
    this.statusCode = statusCode;
    this.metadata = metadata;
    this.stage = options.stage;
    this.retryable = options.retryable ?? false;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class DomainError extends AppError {
  constructor(
    message: string,
    statusCode?: number,
    metadata?: AppErrorMetadata,
    options?: AppErrorOptions
  ) {
    super(message, "DomainError", statusCode, metadata, options);
  }
}

export class InfrastructureError extends AppError {
  constructor(
    message: string,
    statusCode?: number,
    metadata?: AppErrorMetadata,
    options?: AppErrorOptions
  ) {
    super(message, "InfrastructureError", statusCode, metadata, options);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    statusOrMeta: number | AppErrorMetadata = 400,
    metadata?: AppErrorMetadata
  ) {
    if (typeof statusOrMeta === "number") {
      super(message, "ValidationError", statusOrMeta, metadata, {
        stage: "request",
      });
    } else {
      super(message, "ValidationError", 400, statusOrMeta, {
        stage: "request",
      });
    }
  }
}

export class NotFoundError extends DomainError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, 404, metadata, { stage: "request" });
  }
}

/** Raw bytes could not be decoded to text. Fatal, never retried. */
export class UnsupportedFormat extends DomainError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, 415, metadata, { stage: "ingestion", retryable: false });
  }
}

export class InvalidStateTransition extends DomainError {
  constructor(from: string, to: string, metadata?: AppErrorMetadata) {
    super(`Cannot move document version from ${from} to ${to}`, 409, {
      from,
      to,
      ...metadata,
    }, { stage: "ingestion" });
  }
}

export interface EmbeddingWorkItem {
  id: string;
  text: string;
}

/**
 * The embedding service stayed unavailable after every retry. The failed
 * batch travels with the error so the caller can re-queue it.
 */
export class EmbeddingUnavailable extends InfrastructureError {
  public readonly items: EmbeddingWorkItem[];

  constructor(message: string, items: EmbeddingWorkItem[], cause?: unknown) {
    super(message, 503, { batchSize: items.length }, {
      stage: "embedding",
      retryable: true,
      cause,
    });
    this.items = items;
  }
}

export class VectorStoreUnavailable extends InfrastructureError {
  constructor(message: string, metadata?: AppErrorMetadata, cause?: unknown) {
    super(message, 503, metadata, {
      stage: "retrieval",
      retryable: true,
      cause,
    });
  }
}

/** A vector's length disagrees with the configured dimension. Configuration error. */
export class DimensionMismatch extends InfrastructureError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number, stage: PipelineStage = "embedding") {
    super(
      `Vector dimension ${actual} does not match configured dimension ${expected}`,
      500,
      { expected, actual },
      { stage, retryable: false }
    );
    this.expected = expected;
    this.actual = actual;
  }
}

export class GenerationFailure extends InfrastructureError {
  constructor(message: string, cause?: unknown) {
    super(message, 502, undefined, {
      stage: "generation",
      retryable: true,
      cause,
    });
  }
}

export class QueryTimeout extends InfrastructureError {
  constructor(timeoutMs: number, stage: PipelineStage) {
    super(`Query exceeded ${timeoutMs}ms during ${stage}`, 504, { timeoutMs }, {
      stage,
      retryable: true,
    });
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type StorageErrorCode =
  | "NOT_FOUND"
  | "TRANSIENT_ADAPTER_ERROR"
  | "PERMANENT_ADAPTER_ERROR"
  | "TIMEOUT"
  | "ABORTED"
  | "CIRCUIT_OPEN"
  | "UNKNOWN";

export class StorageError extends Error {
  public readonly code: StorageErrorCode;
  public readonly cause?: unknown;
  public readonly metadata?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code: StorageErrorCode;
      cause?: unknown;
      metadata?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = "StorageError";
    this.code = options.code;
    this.cause = options.cause;
    this.metadata = options.metadata;
  }
}

export class NotFoundError extends StorageError {
  constructor(message = "Storage object not found", metadata?: Record<string, unknown>) {
    super(message, { code: "NOT_FOUND", metadata });
    this.name = "NotFoundError";
  }
}

export class TransientAdapterError extends StorageError {
  constructor(message = "Transient adapter failure", metadata?: Record<string, unknown>, cause?: unknown) {
    super(message, { code: "TRANSIENT_ADAPTER_ERROR", metadata, cause });
    this.name = "TransientAdapterError";
  }
}

export class PermanentAdapterError extends StorageError {
  constructor(message = "Permanent adapter failure", metadata?: Record<string, unknown>, cause?: unknown) {
    super(message, { code: "PERMANENT_ADAPTER_ERROR", metadata, cause });
    this.name = "PermanentAdapterError";
  }
}

export class TimeoutError extends StorageError {
  constructor(message = "Storage operation timed out", metadata?: Record<string, unknown>) {
    super(message, { code: "TIMEOUT", metadata });
    this.name = "TimeoutError";
  }
}

export class AbortedError extends StorageError {
  constructor(message = "Storage operation aborted", metadata?: Record<string, unknown>) {
    super(message, { code: "ABORTED", metadata });
    this.name = "AbortedError";
  }
}

export class CircuitOpenError extends StorageError {
  constructor(message = "Storage circuit open", metadata?: Record<string, unknown>) {
    super(message, { code: "CIRCUIT_OPEN", metadata });
    this.name = "CircuitOpenError";
  }
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

export function isTransientStorageError(error: unknown): boolean {
  return (
    error instanceof StorageError &&
    (error.code === "TRANSIENT_ADAPTER_ERROR" || error.code === "TIMEOUT" || error.code === "CIRCUIT_OPEN")
  );
}

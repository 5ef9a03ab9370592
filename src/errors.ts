export type ErrorCode = "INVALID_FORMAT" | "OBJECT_STORE" | "EMPTY_BATCH" | "PUBLISH_TIMEOUT" | "CONFIG";

export class AutomationError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  constructor(code: ErrorCode, message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
  }
}

export class InvalidFormatError extends AutomationError {
  constructor(message: string, public readonly value: string) {
    super("INVALID_FORMAT", message, { value });
  }
}

export type ObjectStoreFailure = "NOT_FOUND" | "PERMISSION_DENIED" | "UNAVAILABLE";

export class ObjectStoreError extends AutomationError {
  constructor(
    public readonly reason: ObjectStoreFailure,
    public readonly bucketId: string,
    message: string,
    cause?: unknown
  ) {
    super("OBJECT_STORE", message, { reason, bucketId }, { cause });
  }
}

export class EmptyBatchError extends AutomationError {
  constructor(public readonly bucketId: string, public readonly prefix: string) {
    super("EMPTY_BATCH", `There are no files in ${bucketId} with the given prefix ${prefix}.`, { bucketId, prefix });
  }
}

// Only ever recorded in a batch outcome, never thrown.
export class PublishTimeoutError extends AutomationError {
  constructor(public readonly objectName: string, public readonly timeoutMs: number) {
    super("PUBLISH_TIMEOUT", `Publishing message for ${objectName} timed out.`, { objectName, timeoutMs });
  }
}

export class ConfigError extends AutomationError {
  constructor(message: string, details?: unknown) {
    super("CONFIG", message, details);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

/**
 * Invalid or missing configuration. Raised before any company is touched.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type PersistenceOperation = "read" | "write" | "clear";
export type PersistenceErrorCode = "persistence_failed" | "watermark_update_failed";

/**
 * Watermark state could not be read or written.
 */
export class PersistenceError extends Error {
  readonly code: PersistenceErrorCode;
  readonly operation: PersistenceOperation;

  constructor(args: {
    operation: PersistenceOperation;
    message: string;
    cause?: unknown;
    code?: PersistenceErrorCode;
  }) {
    super(args.message, { cause: args.cause });
    this.name = "PersistenceError";
    this.code = args.code ?? "persistence_failed";
    this.operation = args.operation;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

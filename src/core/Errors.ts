export type TransferErrorCode =
  | "transient_remote"
  | "remote_request"
  | "batch_failure"
  | "persistence"
  | "not_found";

export abstract class TransferError extends Error {
  abstract readonly code: TransferErrorCode;
  /** Fatal errors abort the whole run instead of failing a single playlist */
  abstract readonly fatal: boolean;
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

/** Network failure, rate limit or 5xx; worth retrying */
export class TransientRemoteError extends TransferError {
  readonly code = "transient_remote";
  readonly fatal = false;
  readonly retryAfterMs?: number;

  constructor(message: string, options: { retryAfterMs?: number; details?: unknown } = {}) {
    super(message, options.details);
    this.retryAfterMs = options.retryAfterMs;
  }
}

/** A remote error that retrying will not fix (4xx other than 429) */
export class RemoteRequestError extends TransferError {
  readonly code = "remote_request";
  readonly fatal = false;
  readonly status?: number;

  constructor(message: string, options: { status?: number; details?: unknown } = {}) {
    super(message, options.details);
    this.status = options.status;
  }
}

export class BatchFailure extends TransferError {
  readonly code = "batch_failure";
  readonly fatal = false;
  readonly attempts: number;
  readonly trackIds: string[];

  constructor(message: string, attempts: number, trackIds: string[], cause?: unknown) {
    super(message, cause);
    this.attempts = attempts;
    this.trackIds = trackIds;
  }
}

export class PersistenceError extends TransferError {
  readonly code = "persistence";
  readonly fatal = true;
  readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, cause);
    this.filePath = filePath;
  }
}

export class NotFoundError extends TransferError {
  readonly code = "not_found";
  readonly fatal = true;
}

export const isTransferError = (error: unknown): error is TransferError =>
  error instanceof TransferError;

export const isFatalError = (error: unknown): boolean =>
  !isTransferError(error) || error.fatal;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Transport-level failure from any remote adapter: HTTP error status, timeout,
 * dropped connection, or a provider body that signals an error.
 */
export class RemoteCallError extends Error {
  readonly code = "remote_call_failed";
  readonly status?: number;
  readonly isTimeout: boolean;
  readonly retryDelayMs?: number;
  readonly requestUrl?: string;
  readonly cause?: unknown;

  constructor(args: {
    message: string;
    status?: number;
    isTimeout?: boolean;
    retryDelayMs?: number;
    requestUrl?: string;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "RemoteCallError";
    this.status = args.status;
    this.isTimeout = args.isTimeout ?? false;
    this.retryDelayMs = args.retryDelayMs;
    this.requestUrl = args.requestUrl;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const isRemoteCallError = (err: unknown): err is RemoteCallError => err instanceof RemoteCallError;

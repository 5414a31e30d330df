// backend/services/shared/src/http/HttpError.ts

/**
 * Error carrying an HTTP status and a client-safe message.
 * The error tail renders `{ error: message }` with this status.
 */
export class HttpError extends Error {
  public readonly status: number;

  constructor(status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HttpError";
    this.status = status;
  }
}

/**
 * Base class for errors that carry an HTTP status for the API layer.
 */
export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

// Bad query or body parameters. Raised before any scoring happens.
export class RequestValidationError extends AppError {
  readonly details: string[];

  constructor(details: string[]) {
    super(`Invalid request: ${details.join('; ')}`, 400);
    this.details = details;
  }
}

// The FPL API could not be reached or returned something unusable.
export class UpstreamError extends AppError {
  readonly endpoint: string;
  readonly upstreamStatus: number | null;

  constructor(endpoint: string, upstreamStatus: number | null, message: string) {
    super(`FPL API request to ${endpoint} failed: ${message}`, 502);
    this.endpoint = endpoint;
    this.upstreamStatus = upstreamStatus;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Base class for every failure a poll cycle or a delivery can raise. */
export abstract class HomeworkWatchError extends Error {}

/** Transport failure, timeout or non-success status from the homework API. */
export class ApiError extends HomeworkWatchError {
  constructor(
    message: string,
    public readonly status: number | null = null,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class MalformedResponseError extends HomeworkWatchError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

export class MissingFieldError extends HomeworkWatchError {
  constructor(public readonly field: string) {
    super(`Missing field "${field}" in API response`);
    this.name = 'MissingFieldError';
  }
}

export class UnknownVerdictError extends HomeworkWatchError {
  constructor(public readonly code: string) {
    super(`Unknown homework status: ${code}`);
    this.name = 'UnknownVerdictError';
  }
}

export class DeliveryError extends HomeworkWatchError {
  constructor(
    message: string,
    public readonly status: number | null = null,
  ) {
    super(message);
    this.name = 'DeliveryError';
  }
}

/** Raised before startup when required environment variables are absent. */
export class MissingConfigError extends Error {
  constructor(public readonly missing: string[]) {
    super(`Missing required environment variables: ${missing.join(', ')}`);
    this.name = 'MissingConfigError';
  }
}

export function isHomeworkWatchError(error: unknown): error is HomeworkWatchError {
  return error instanceof HomeworkWatchError;
}

// src/errors.ts

export const TITLES = {
  validation: "Validation Error",
  notFound: "Resource Not Found",
  rateLimited: "Rate Limit Exceeded",
  unavailable: "Service Unavailable",
  internal: "Internal Server Error",
  api: "API Error",
} as const;

const SERVICE_UNAVAILABLE_MESSAGE = "Service temporarily unavailable. Please try again later.";
const RATE_LIMIT_MESSAGE = "API rate limit exceeded. Please try again later.";
const INTERNAL_ERROR_MESSAGE = "An unexpected error occurred while communicating with the API.";

export interface DomainErrorInit {
  title: string;
  detail: string;
  statusCode: number;
  cause?: unknown;
}

/**
 * The only error that leaves the gateway. `statusCode` is an HTTP-range
 * severity code; it does not tie the error to any transport.
 */
export class DomainError extends Error {
  readonly title: string;
  readonly detail: string;
  readonly statusCode: number;

  constructor(init: DomainErrorInit) {
    super(init.detail, init.cause === undefined ? undefined : { cause: init.cause });
    this.name = "DomainError";
    this.title = init.title;
    this.detail = init.detail;
    this.statusCode = init.statusCode >= 100 && init.statusCode <= 599 ? init.statusCode : 500;
  }
}

export function notFound(resource: string, cause?: unknown): DomainError {
  return new DomainError({ title: TITLES.notFound, detail: `Cannot find ${resource}`, statusCode: 404, cause });
}

export function rateLimitExceeded(cause?: unknown): DomainError {
  return new DomainError({ title: TITLES.rateLimited, detail: RATE_LIMIT_MESSAGE, statusCode: 429, cause });
}

export function serviceUnavailable(detail: string = SERVICE_UNAVAILABLE_MESSAGE, cause?: unknown): DomainError {
  return new DomainError({ title: TITLES.unavailable, detail, statusCode: 503, cause });
}

export function internalError(detail: string = INTERNAL_ERROR_MESSAGE, cause?: unknown): DomainError {
  return new DomainError({ title: TITLES.internal, detail, statusCode: 500, cause });
}

/** Upstream rejected the request with a 4xx other than 404/429; its status is kept. */
export function apiError(status: number, resource: string, cause?: unknown): DomainError {
  return new DomainError({
    title: TITLES.api,
    detail: `Upstream rejected the request for ${resource} with status ${status}`,
    statusCode: status,
    cause,
  });
}

export function badRequest(detail: string): DomainError {
  return new DomainError({ title: TITLES.validation, detail, statusCode: 400 });
}

/**
 * Anything that is not already a DomainError becomes a generic 500.
 */
export function toDomainError(err: unknown): DomainError {
  if (err instanceof DomainError) return err;
  return internalError(INTERNAL_ERROR_MESSAGE, err);
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

// src/problem.ts
import type { DomainError } from "./errors.js";

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

// Fixed rate-limit policy advertised to callers; not read from upstream.
export const RETRY_AFTER_SECONDS = 60;
export const RATE_LIMIT_LIMIT = 100;
export const RATE_LIMIT_REMAINING = 0;

export interface ProblemBody {
  type: string;
  title: string;
  status: number;
  detail: string;
}

export interface ProblemResponse {
  status: number;
  headers: Record<string, string>;
  body: ProblemBody;
}

/**
 * Render a DomainError as an RFC 7807 problem response. Rate-limited
 * errors also carry Retry-After and X-RateLimit-* headers.
 */
export function buildProblemResponse(error: DomainError, nowMs: number = Date.now()): ProblemResponse {
  const headers: Record<string, string> = { "Content-Type": PROBLEM_CONTENT_TYPE };

  if (error.statusCode === 429) {
    const resetEpochSeconds = Math.floor(nowMs / 1000) + RETRY_AFTER_SECONDS;
    headers["Retry-After"] = String(RETRY_AFTER_SECONDS);
    headers["X-RateLimit-Limit"] = String(RATE_LIMIT_LIMIT);
    headers["X-RateLimit-Remaining"] = String(RATE_LIMIT_REMAINING);
    headers["X-RateLimit-Reset"] = String(resetEpochSeconds);
  }

  return {
    status: error.statusCode,
    headers,
    body: {
      type: "about:blank",
      title: error.title,
      status: error.statusCode,
      detail: error.detail,
    },
  };
}

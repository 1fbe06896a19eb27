// src/classifier.ts
import type { Operation } from "./operations.js";
import type { Classification, FailureClass, Outcome } from "./types.js";

const RETRYABLE_STATUSES = new Set([500, 502, 503, 504]);

function isAbsent(body: unknown): boolean {
  if (body === null || body === undefined) return true;
  return typeof body === "object" && !Array.isArray(body) && Object.keys(body).length === 0;
}

/** Delta-seconds only; an HTTP-date would make classification depend on the clock. */
export function parseRetryAfter(value: string | undefined): number | undefined {
  if (value === undefined || !/^\s*\d+\s*$/.test(value)) return undefined;
  return Number(value.trim()) * 1000;
}

function decode<T>(body: string, operation: Operation<T>): Classification<T> {
  let json: unknown = null;
  if (body.trim() !== "") {
    try {
      json = JSON.parse(body);
    } catch (err) {
      return { class: "FATAL", reason: "upstream returned malformed JSON", cause: err };
    }
  }

  if (isAbsent(json)) {
    if (operation.empty === undefined) return { class: "NOT_FOUND" };
    return { class: "SUCCESS", value: operation.empty() };
  }

  const parsed = operation.schema.safeParse(json);
  if (!parsed.success) {
    return { class: "FATAL", reason: `unexpected payload shape for ${operation.name}`, cause: parsed.error };
  }
  return { class: "SUCCESS", value: parsed.data };
}

/**
 * Assign a failure class to the outcome of one attempt. Pure: the same
 * outcome and operation always yield the same classification.
 */
export function classify<T>(outcome: Outcome, operation: Operation<T>): Classification<T> {
  switch (outcome.kind) {
    case "transport-failure":
      return { class: "RETRYABLE_TRANSIENT", reason: `transport ${outcome.reason}`, cause: outcome.cause };

    case "success":
      return decode(outcome.body, operation);

    case "http-status": {
      const { status } = outcome;
      if (RETRYABLE_STATUSES.has(status)) {
        return { class: "RETRYABLE_TRANSIENT", reason: `upstream status ${status}`, status };
      }
      if (status === 429) {
        return { class: "RATE_LIMITED", retryAfterMs: parseRetryAfter(outcome.headers["retry-after"]) };
      }
      if (status === 404) return { class: "NOT_FOUND" };
      if (status >= 400 && status < 500) return { class: "CLIENT_ERROR", status };
      return { class: "FATAL", reason: `unexpected upstream status ${status}` };
    }
  }
}

export function isRetryable(cls: FailureClass): boolean {
  return cls === "RETRYABLE_TRANSIENT" || cls === "RATE_LIMITED";
}

/**
 * What the circuit breaker records as a failure. A 404 or other 4xx means
 * upstream answered correctly, so it counts as a success.
 */
export function countsAsFailure(cls: FailureClass): boolean {
  return cls === "RETRYABLE_TRANSIENT" || cls === "RATE_LIMITED" || cls === "FATAL";
}

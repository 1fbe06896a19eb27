export type HttpMethod = "GET";

export type SortField = "id" | "userId" | "title";
export type SortOrder = "asc" | "desc";

export const SORT_FIELDS: readonly SortField[] = ["id", "userId", "title"];
export const SORT_ORDERS: readonly SortOrder[] = ["asc", "desc"];

/**
 * Filters, pagination and sorting for the post listing.
 * `sort` and `order` stay plain strings until validated.
 */
export interface SearchCriteria {
  readonly userId?: number;
  readonly titleContains?: string;
  readonly page?: number;
  readonly size?: number;
  readonly sort?: string;
  readonly order?: string;
}

export interface Comment {
  postId: number;
  id: number;
  name: string;
  email: string;
  body: string;
}

export interface Post {
  userId: number;
  id: number;
  title: string;
  body: string;
  comments?: Comment[];
}

export type TransportFailureReason = "timeout" | "connect" | "dns" | "tls" | "reset" | "aborted" | "unknown";

/**
 * Raw result of a single upstream attempt. Never retained past classification.
 */
export type Outcome =
  | { kind: "success"; status: number; headers: Record<string, string>; body: string }
  | { kind: "http-status"; status: number; headers: Record<string, string>; body: string }
  | { kind: "transport-failure"; reason: TransportFailureReason; cause: unknown };

export type FailureClass =
  | "SUCCESS"
  | "RETRYABLE_TRANSIENT"
  | "RATE_LIMITED"
  | "NOT_FOUND"
  | "CLIENT_ERROR"
  | "FATAL";

export type Classification<T> =
  | { class: "SUCCESS"; value: T }
  | { class: "RETRYABLE_TRANSIENT"; reason: string; status?: number; cause?: unknown }
  | { class: "RATE_LIMITED"; retryAfterMs?: number }
  | { class: "NOT_FOUND" }
  | { class: "CLIENT_ERROR"; status: number }
  | { class: "FATAL"; reason: string; cause?: unknown };

export type FailedClassification = Exclude<Classification<unknown>, { class: "SUCCESS" }>;

export type BreakerState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface BreakerOptions {
  name: string;
  windowSize: number;          // e.g. 20
  minRequests: number;         // e.g. 5
  failureThreshold: number;    // 0..1 (e.g. 0.5)
  cooldownMs: number;          // e.g. 30000
  halfOpenProbeCount: number;  // e.g. 3
}

export interface RetryOptions {
  maxAttempts: number;  // e.g. 3
  baseDelayMs: number;  // e.g. 200
  maxDelayMs: number;   // e.g. 2000
  multiplier?: number;  // default 2
  jitterRatio?: number; // default 0.2
}

export interface UpstreamOptions {
  baseUrl: string;
  postsPath: string;
  commentsPath: string;
  connectTimeoutMs: number;
  readTimeoutMs: number;
}

/**
 * Per-call controls supplied by the caller.
 */
export interface CallOptions {
  signal?: AbortSignal;
  /** Overall deadline for the logical operation, retries included. */
  timeoutMs?: number;
  /** Correlation id, forwarded upstream as X-Request-ID. */
  requestId?: string;
}

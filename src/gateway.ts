// src/gateway.ts
import { EventEmitter } from "node:events";
import type { CircuitBreaker, BreakerTransition } from "./breaker.js";
import { classify, countsAsFailure } from "./classifier.js";
import {
  apiError,
  badRequest,
  internalError,
  notFound,
  rateLimitExceeded,
  serviceUnavailable,
  toDomainError,
  type DomainError,
} from "./errors.js";
import type { GatewayEvents } from "./events.js";
import type { TransportClient } from "./http.js";
import {
  COMMENTS_FOR_POST,
  LIST_POSTS,
  POST_BY_ID,
  POST_WITH_COMMENTS,
  buildUrl,
  type OperationName,
  type OperationRequest,
} from "./operations.js";
import { toQueryParams } from "./query.js";
import type { RetryPolicy } from "./retry.js";
import type { GatewaySnapshot } from "./snapshot.js";
import type {
  CallOptions,
  Classification,
  Comment,
  FailedClassification,
  Outcome,
  Post,
  SearchCriteria,
  UpstreamOptions,
} from "./types.js";
import { sleep } from "./utils/sleep.js";
import { validateSearchCriteria, validationError } from "./validation.js";

const DEADLINE_MESSAGE = "The request deadline expired before the upstream service responded.";
const ABORTED_MESSAGE = "The request was cancelled before the upstream service responded.";

export type Interruption = "aborted" | "deadline";

/** Why a call ended without a payload, before it is turned into a DomainError. */
export type GatewayFailure =
  | { kind: "classified"; operation: OperationName; resource: string; classification: FailedClassification }
  | { kind: "circuit-open"; operation: OperationName; resource: string; retryAfterMs?: number }
  | {
      kind: "interrupted";
      reason: Interruption;
      operation: OperationName;
      resource: string;
      last?: FailedClassification;
    };

/**
 * Maps a failure to the DomainError the caller sees. Chosen once, when the
 * gateway is built.
 */
export type Fallback = (failure: GatewayFailure) => DomainError;

export function defaultFallback(failure: GatewayFailure): DomainError {
  switch (failure.kind) {
    case "circuit-open":
      return serviceUnavailable();
    case "interrupted":
      return serviceUnavailable(failure.reason === "aborted" ? ABORTED_MESSAGE : DEADLINE_MESSAGE);
    case "classified": {
      const c = failure.classification;
      switch (c.class) {
        case "NOT_FOUND":
          return notFound(failure.resource);
        case "CLIENT_ERROR":
          return apiError(c.status, failure.resource);
        case "RATE_LIMITED":
          return rateLimitExceeded();
        case "RETRYABLE_TRANSIENT":
          return serviceUnavailable(undefined, c.cause);
        case "FATAL":
          return internalError(undefined, c.cause);
      }
    }
  }
}

export interface ResilientGatewayOptions {
  upstream: UpstreamOptions;
  transport: TransportClient;
  retry: RetryPolicy;
  /** Process-wide; shared by every call to this upstream. */
  breaker: CircuitBreaker;
  fallback?: Fallback;
  now?: () => number;
}

function genCallId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 10)}`;
}

function isPositiveInteger(id: number): boolean {
  return Number.isInteger(id) && id >= 1;
}

/**
 * Read-only gateway to the upstream posts API.
 *
 * Each operation runs breaker-gated, retry-driven attempts and resolves to
 * the decoded payload. Every failure rejects with a DomainError.
 */
export class ResilientGateway extends EventEmitter<GatewayEvents> {
  private readonly upstream: UpstreamOptions;
  private readonly transport: TransportClient;
  private readonly retry: RetryPolicy;
  private readonly breaker: CircuitBreaker;
  private readonly fallback: Fallback;
  private readonly now: () => number;
  private readonly attemptTimeoutMs: number;

  constructor(opts: ResilientGatewayOptions) {
    super();
    this.upstream = opts.upstream;
    this.transport = opts.transport;
    this.retry = opts.retry;
    this.breaker = opts.breaker;
    this.fallback = opts.fallback ?? defaultFallback;
    this.now = opts.now ?? Date.now;
    this.attemptTimeoutMs = opts.upstream.connectTimeoutMs + opts.upstream.readTimeoutMs;
  }

  listPosts(criteria: SearchCriteria, opts?: CallOptions): Promise<Post[]> {
    const violations = validateSearchCriteria(criteria);
    if (violations.length > 0) return Promise.reject(validationError(violations));

    return this.run({ operation: LIST_POSTS, query: toQueryParams(criteria), resource: "posts" }, opts);
  }

  getPost(id: number, opts?: CallOptions): Promise<Post> {
    if (!isPositiveInteger(id)) return Promise.reject(invalidId("id"));
    return this.run({ operation: POST_BY_ID, id, resource: `Post with id ${id}` }, opts);
  }

  getPostWithComments(id: number, opts?: CallOptions): Promise<Post> {
    if (!isPositiveInteger(id)) return Promise.reject(invalidId("id"));
    return this.run({ operation: POST_WITH_COMMENTS, id, resource: `Post with id ${id}` }, opts);
  }

  getComments(postId: number, opts?: CallOptions): Promise<Comment[]> {
    if (!isPositiveInteger(postId)) return Promise.reject(invalidId("postId"));
    return this.run({ operation: COMMENTS_FOR_POST, id: postId, resource: `comments for post with id ${postId}` }, opts);
  }

  snapshot(): GatewaySnapshot {
    return {
      upstream: this.upstream.baseUrl,
      maxAttempts: this.retry.maxAttempts,
      breaker: this.breaker.snapshot(),
    };
  }

  private async run<T>(req: OperationRequest<T>, opts: CallOptions = {}): Promise<T> {
    try {
      return await this.execute(req, opts);
    } catch (err) {
      throw toDomainError(err);
    }
  }

  private async execute<T>(req: OperationRequest<T>, opts: CallOptions): Promise<T> {
    const operation = req.operation.name;
    const callId = opts.requestId ?? genCallId();
    const url = buildUrl(this.upstream, req);
    const state = this.retry.start(this.now());
    const deadlineAt = opts.timeoutMs === undefined ? undefined : state.startedAtMs + opts.timeoutMs;

    let last: FailedClassification | undefined;

    for (;;) {
      const interrupted = this.interruption(opts.signal, deadlineAt);
      if (interrupted) {
        this.emit("request:rejected", { operation, callId, reason: interrupted });
        throw this.surface({ kind: "interrupted", reason: interrupted, operation, resource: req.resource, last });
      }

      const decision = this.breaker.allow(this.now());
      if (decision.transition) this.emitTransition(decision.transition);
      if (!decision.allowed) {
        this.emit("request:rejected", { operation, callId, reason: "circuit-open", retryAfterMs: decision.retryAfterMs });
        // A refused re-attempt surfaces what the previous attempt saw.
        throw this.surface(
          last
            ? { kind: "classified", operation, resource: req.resource, classification: last }
            : { kind: "circuit-open", operation, resource: req.resource, retryAfterMs: decision.retryAfterMs }
        );
      }

      state.attempt += 1;
      const attempt = state.attempt;
      const start = this.now();
      const budget = this.attemptBudget(deadlineAt, start);
      this.emit("request:start", { operation, url, callId, attempt });

      let outcome: Outcome;
      try {
        outcome = await this.transport.execute({
          url,
          timeoutMs: budget.timeoutMs,
          signal: opts.signal,
          headers: { "x-request-id": callId },
        });
      } catch (err) {
        this.breaker.release(decision.permit);
        throw err;
      }
      const durationMs = this.now() - start;

      // Cut short by the caller: no verdict on upstream health.
      if (outcome.kind === "transport-failure") {
        const cut =
          this.interruption(opts.signal, deadlineAt) ??
          (outcome.reason === "timeout" && budget.cappedByDeadline ? "deadline" : undefined);
        if (cut) {
          this.breaker.release(decision.permit);
          this.emit("request:rejected", { operation, callId, reason: cut });
          throw this.surface({ kind: "interrupted", reason: cut, operation, resource: req.resource, last });
        }
      }

      const cls: Classification<T> = classify(outcome, req.operation);
      const transition = countsAsFailure(cls.class)
        ? this.breaker.onFailure(decision.permit, this.now())
        : this.breaker.onSuccess(decision.permit);
      if (transition) this.emitTransition(transition);

      const status = outcome.kind === "transport-failure" ? undefined : outcome.status;
      const body = outcome.kind === "transport-failure" ? undefined : outcome.body;

      if (cls.class === "SUCCESS") {
        this.emit("request:success", { operation, url, callId, attempt, durationMs, status, body, failureClass: cls.class });
        return cls.value;
      }

      this.emit("request:failure", { operation, url, callId, attempt, durationMs, status, body, failureClass: cls.class });
      last = cls;

      if (!this.retry.shouldRetry(cls.class, state)) {
        throw this.surface({ kind: "classified", operation, resource: req.resource, classification: cls });
      }

      const delayMs = this.retry.nextDelay(state, cls.class === "RATE_LIMITED" ? cls.retryAfterMs : undefined);
      if (deadlineAt !== undefined && this.now() + delayMs >= deadlineAt) {
        throw this.surface({ kind: "classified", operation, resource: req.resource, classification: cls });
      }

      this.emit("retry:scheduled", { operation, url, callId, attempt, delayMs, failureClass: cls.class });
      await sleep(delayMs, opts.signal);
    }
  }

  private interruption(signal: AbortSignal | undefined, deadlineAt: number | undefined): Interruption | undefined {
    if (signal?.aborted) return "aborted";
    if (deadlineAt !== undefined && this.now() >= deadlineAt) return "deadline";
    return undefined;
  }

  /** Per-attempt timeout, shortened to what is left of the caller's deadline. */
  private attemptBudget(deadlineAt: number | undefined, nowMs: number): { timeoutMs: number; cappedByDeadline: boolean } {
    if (deadlineAt === undefined || deadlineAt - nowMs >= this.attemptTimeoutMs) {
      return { timeoutMs: this.attemptTimeoutMs, cappedByDeadline: false };
    }
    return { timeoutMs: Math.max(1, deadlineAt - nowMs), cappedByDeadline: true };
  }

  private surface(failure: GatewayFailure): DomainError {
    try {
      return this.fallback(failure);
    } catch (err) {
      return toDomainError(err);
    }
  }

  private emitTransition(t: BreakerTransition): void {
    this.emit("breaker:state", { name: this.breaker.name, from: t.from, to: t.to });
  }
}

function invalidId(field: string): DomainError {
  return badRequest(`${field}: Post id must be a positive integer`);
}

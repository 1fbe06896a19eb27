import type { BreakerTransition } from "./breaker.js";
import type { OperationName } from "./operations.js";
import type { FailureClass } from "./types.js";

export interface AttemptEvent {
  operation: OperationName;
  url: string;
  callId: string;
  attempt: number;
}

export interface AttemptResultEvent extends AttemptEvent {
  durationMs: number;
  status?: number;          // set when upstream answered
  failureClass: FailureClass;
  body?: string;            // raw upstream body, for trace logging
}

export interface RetryScheduledEvent extends AttemptEvent {
  delayMs: number;
  failureClass: FailureClass;
}

export interface RejectedEvent {
  operation: OperationName;
  callId: string;
  reason: "circuit-open" | "deadline" | "aborted";
  retryAfterMs?: number;
}

export interface BreakerStateEvent extends BreakerTransition {
  name: string;
}

export interface GatewayEvents {
  "request:start": [AttemptEvent];
  "request:success": [AttemptResultEvent];
  "request:failure": [AttemptResultEvent];
  "request:rejected": [RejectedEvent];
  "retry:scheduled": [RetryScheduledEvent];
  "breaker:state": [BreakerStateEvent];
}

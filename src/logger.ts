// src/logger.ts
import { pino, type Logger } from "pino";
import type { ResilientGateway } from "./gateway.js";

export type { Logger };

const MAX_BODY_LOG_LENGTH = 1000;

export function createLogger(level: string = "info"): Logger {
  return pino({
    level,
    base: { service: "posts-gateway" },
  });
}

export function truncate(text: string, max: number = MAX_BODY_LOG_LENGTH): string {
  return text.length <= max ? text : `${text.slice(0, max)}...[truncated]`;
}

/**
 * Route gateway events to the logger: attempts at debug, failures and
 * retries at warn, breaker transitions at info.
 */
export function attachGatewayLogging(gateway: ResilientGateway, parent: Logger): void {
  const log = parent.child({ component: "gateway" });

  gateway.on("request:start", (e) => {
    log.debug({ callId: e.callId, operation: e.operation, attempt: e.attempt }, `==> GET ${e.url}`);
  });

  gateway.on("request:success", (e) => {
    log.debug(
      { callId: e.callId, operation: e.operation, attempt: e.attempt, status: e.status, durationMs: e.durationMs },
      `<== GET ${e.url} - Status: ${e.status ?? "n/a"} (${e.durationMs}ms)`
    );
    if (e.body !== undefined && log.isLevelEnabled("trace")) {
      log.trace({ callId: e.callId }, `<== Body: ${truncate(e.body)}`);
    }
  });

  gateway.on("request:failure", (e) => {
    log.warn(
      {
        callId: e.callId,
        operation: e.operation,
        attempt: e.attempt,
        status: e.status,
        failureClass: e.failureClass,
        durationMs: e.durationMs,
      },
      "upstream attempt failed"
    );
  });

  gateway.on("retry:scheduled", (e) => {
    log.warn(
      { callId: e.callId, operation: e.operation, attempt: e.attempt, delayMs: e.delayMs, failureClass: e.failureClass },
      "retrying upstream call"
    );
  });

  gateway.on("request:rejected", (e) => {
    log.warn({ callId: e.callId, operation: e.operation, reason: e.reason, retryAfterMs: e.retryAfterMs }, "upstream call rejected");
  });

  gateway.on("breaker:state", (e) => {
    log.info({ breaker: e.name, from: e.from, to: e.to }, `circuit breaker ${e.from} -> ${e.to}`);
  });
}

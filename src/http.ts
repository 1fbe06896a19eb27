// src/http.ts
import { Agent, request as undiciRequest } from "undici";
import type { Outcome, TransportFailureReason } from "./types.js";

export interface TransportRequest {
  url: string;
  /** Hard cap for the whole attempt (connect + headers + body). */
  timeoutMs: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

/**
 * A single outbound GET. Implementations never throw: every result,
 * transport failures included, comes back as an Outcome.
 */
export interface TransportClient {
  execute(req: TransportRequest): Promise<Outcome>;
  close?(): Promise<void>;
}

const TIMEOUT_CODES = new Set([
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "ETIMEDOUT",
]);
const CONNECT_CODES = new Set(["ECONNREFUSED", "EHOSTUNREACH", "ENETUNREACH", "EADDRNOTAVAIL"]);
const DNS_CODES = new Set(["ENOTFOUND", "EAI_AGAIN"]);
const RESET_CODES = new Set(["ECONNRESET", "EPIPE", "UND_ERR_SOCKET", "UND_ERR_CLOSED"]);

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("code" in err && typeof err.code === "string") return err.code;
  // undici wraps socket errors: the errno lives on `cause`
  if ("cause" in err) return errorCode(err.cause);
  return undefined;
}

export function failureReason(err: unknown): TransportFailureReason {
  const code = errorCode(err);
  if (code !== undefined) {
    if (TIMEOUT_CODES.has(code)) return "timeout";
    if (CONNECT_CODES.has(code)) return "connect";
    if (DNS_CODES.has(code)) return "dns";
    if (RESET_CODES.has(code)) return "reset";
    if (code.startsWith("ERR_TLS") || code.includes("CERT")) return "tls";
  }
  if (err instanceof Error && err.name === "AbortError") return "aborted";
  return "unknown";
}

function normalizeHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(headers)) {
    if (Array.isArray(v)) out[k.toLowerCase()] = v.join(", ");
    else if (typeof v === "string") out[k.toLowerCase()] = v;
  }
  return out;
}

export interface UndiciTransportOptions {
  connectTimeoutMs: number;
  readTimeoutMs: number;
}

/**
 * undici-backed transport. Connect and read timeouts live on the Agent;
 * the per-attempt `timeoutMs` and the caller's signal abort through an
 * AbortController. No retries, no breaker: raw outbound I/O only.
 */
export class UndiciTransport implements TransportClient {
  private readonly agent: Agent;

  constructor(opts: UndiciTransportOptions) {
    if (!Number.isFinite(opts.connectTimeoutMs) || opts.connectTimeoutMs <= 0) {
      throw new Error(`connectTimeoutMs must be > 0 (got ${opts.connectTimeoutMs})`);
    }
    if (!Number.isFinite(opts.readTimeoutMs) || opts.readTimeoutMs <= 0) {
      throw new Error(`readTimeoutMs must be > 0 (got ${opts.readTimeoutMs})`);
    }

    this.agent = new Agent({
      connect: { timeout: opts.connectTimeoutMs },
      headersTimeout: opts.readTimeoutMs,
      bodyTimeout: opts.readTimeoutMs,
    });
  }

  async execute(req: TransportRequest): Promise<Outcome> {
    const ac = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      ac.abort();
    }, req.timeoutMs);

    const onCallerAbort = (): void => ac.abort();
    if (req.signal?.aborted) ac.abort();
    else req.signal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      const res = await undiciRequest(req.url, {
        method: "GET",
        headers: { accept: "application/json", ...req.headers },
        signal: ac.signal,
        dispatcher: this.agent,
      });

      const body = await res.body.text();
      const headers = normalizeHeaders(res.headers);
      if (res.statusCode >= 200 && res.statusCode < 300) {
        return { kind: "success", status: res.statusCode, headers, body };
      }
      return { kind: "http-status", status: res.statusCode, headers, body };
    } catch (err) {
      if (timedOut) return { kind: "transport-failure", reason: "timeout", cause: err };
      return { kind: "transport-failure", reason: failureReason(err), cause: err };
    } finally {
      clearTimeout(timer);
      req.signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}

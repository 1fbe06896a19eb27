// test/gateway.test.ts
import { describe, expect, it } from "vitest";
import { CircuitBreaker } from "../src/breaker.js";
import { DomainError } from "../src/errors.js";
import type { BreakerStateEvent } from "../src/events.js";
import { ResilientGateway, type ResilientGatewayOptions } from "../src/gateway.js";
import { buildProblemResponse } from "../src/problem.js";
import { RetryPolicy } from "../src/retry.js";
import type { BreakerOptions, Outcome } from "../src/types.js";
import {
  SAMPLE_COMMENT,
  SAMPLE_POST,
  ScriptedTransport,
  connectionRefused,
  reply,
  type Responder,
} from "./support/scriptedTransport.js";

interface Setup {
  maxAttempts?: number;
  baseDelayMs?: number;
  breaker?: Partial<BreakerOptions>;
  gateway?: Partial<ResilientGatewayOptions>;
}

function setup(respond: Responder, opts: Setup = {}) {
  const transport = new ScriptedTransport(respond);
  const breaker = new CircuitBreaker({
    name: "postsApi",
    windowSize: 10,
    minRequests: 10,
    failureThreshold: 0.5,
    cooldownMs: 1000,
    halfOpenProbeCount: 1,
    ...opts.breaker,
  });
  const gateway = new ResilientGateway({
    upstream: {
      baseUrl: "http://upstream.test",
      postsPath: "/posts",
      commentsPath: "/comments",
      connectTimeoutMs: 100,
      readTimeoutMs: 100,
    },
    transport,
    retry: new RetryPolicy({ maxAttempts: opts.maxAttempts ?? 3, baseDelayMs: opts.baseDelayMs ?? 1, maxDelayMs: 50 }, () => 0),
    breaker,
    ...opts.gateway,
  });
  return { gateway, transport, breaker };
}

async function failure(promise: Promise<unknown>): Promise<DomainError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof DomainError) return err;
    throw new Error(`expected a DomainError, got ${String(err)}`);
  }
  throw new Error("expected the call to fail");
}

describe("ResilientGateway", () => {
  it("lists posts", async () => {
    const { gateway, transport } = setup(() => reply(200, [SAMPLE_POST]));

    const posts = await gateway.listPosts({});

    expect(posts).toHaveLength(1);
    expect(posts[0]?.id).toBe(1);
    expect(transport.calls.map((c) => c.url)).toEqual(["http://upstream.test/posts"]);
  });

  it("returns a fresh empty list for every empty response", async () => {
    const { gateway } = setup(() => reply(200, ""));

    const first = await gateway.listPosts({});
    first.push({ ...SAMPLE_POST, id: 42 });
    const second = await gateway.listPosts({});
    const comments = await gateway.getComments(1);

    expect(second).toEqual([]);
    expect(comments).toEqual([]);
  });

  it("translates criteria into the upstream query", async () => {
    const { gateway, transport } = setup(() => reply(200, []));

    await gateway.listPosts({ userId: 1, page: 2, size: 5, sort: "title", order: "desc" });

    expect(transport.calls[0]?.url).toBe("http://upstream.test/posts?userId=1&_page=2&_limit=5&_sort=title&_order=desc");
  });

  it("rejects invalid criteria before any upstream call", async () => {
    const { gateway, transport } = setup(() => reply(200, []));

    const err = await failure(gateway.listPosts({ page: 1 }));

    expect(err.statusCode).toBe(400);
    expect(err.title).toBe("Validation Error");
    expect(err.detail).toBe("size: Both page and size must be provided together");
    expect(transport.calls).toHaveLength(0);
  });

  it("builds the embed and comments URLs", async () => {
    const { gateway, transport } = setup((req) =>
      req.url.endsWith("/comments") ? reply(200, [SAMPLE_COMMENT]) : reply(200, { ...SAMPLE_POST, comments: [SAMPLE_COMMENT] })
    );

    const post = await gateway.getPostWithComments(1);
    const comments = await gateway.getComments(1);

    expect(post.comments).toEqual([SAMPLE_COMMENT]);
    expect(comments).toEqual([SAMPLE_COMMENT]);
    expect(transport.calls.map((c) => c.url)).toEqual([
      "http://upstream.test/posts/1?_embed=comments",
      "http://upstream.test/posts/1/comments",
    ]);
  });

  it("makes exactly maxAttempts calls and returns 503 for persistent 5xx", async () => {
    const { gateway, transport } = setup(() => reply(503));

    const err = await failure(gateway.listPosts({}));

    expect(transport.calls).toHaveLength(3);
    expect(err.statusCode).toBe(503);
    expect(err.title).toBe("Service Unavailable");
    expect(err.detail).toBe("Service temporarily unavailable. Please try again later.");
  });

  it("recovers when a retry succeeds", async () => {
    const { gateway, transport } = setup((_req, n) => (n === 1 ? connectionRefused() : reply(200, SAMPLE_POST)));
    const retries: number[] = [];
    gateway.on("retry:scheduled", (e) => retries.push(e.attempt));

    const post = await gateway.getPost(1);

    expect(post).toEqual(SAMPLE_POST);
    expect(transport.calls).toHaveLength(2);
    expect(retries).toEqual([1]);
  });

  it("returns 404 without retrying", async () => {
    const { gateway, transport } = setup(() => reply(404, {}));

    const err = await failure(gateway.getPost(999));

    expect(err.statusCode).toBe(404);
    expect(err.title).toBe("Resource Not Found");
    expect(err.detail).toBe("Cannot find Post with id 999");
    expect(transport.calls).toHaveLength(1);
  });

  it("turns an empty success body into 404", async () => {
    const { gateway } = setup(() => reply(200, ""));

    const err = await failure(gateway.getPostWithComments(5));

    expect(err.statusCode).toBe(404);
    expect(err.title).toBe("Resource Not Found");
  });

  it("keeps the upstream status of other client errors", async () => {
    const { gateway, transport } = setup(() => reply(403));

    const err = await failure(gateway.getComments(7));

    expect(err.statusCode).toBe(403);
    expect(err.title).toBe("API Error");
    expect(err.detail).toBe("Upstream rejected the request for comments for post with id 7 with status 403");
    expect(transport.calls).toHaveLength(1);
  });

  it("surfaces persistent 429 as rate limited with Retry-After", async () => {
    const { gateway, transport } = setup(() => reply(429));

    const err = await failure(gateway.listPosts({}));

    expect(transport.calls).toHaveLength(3);
    expect(err.statusCode).toBe(429);
    expect(err.title).toBe("Rate Limit Exceeded");
    expect(buildProblemResponse(err).headers["Retry-After"]).toBe("60");
  });

  it("maps malformed payloads to 500 without retrying", async () => {
    const { gateway, transport } = setup(() => reply(200, "<html>"));

    const err = await failure(gateway.getPost(1));

    expect(err.statusCode).toBe(500);
    expect(err.title).toBe("Internal Server Error");
    expect(err.detail).toBe("An unexpected error occurred while communicating with the API.");
    expect(transport.calls).toHaveLength(1);
  });

  it("rejects non-positive ids locally", async () => {
    const { gateway, transport } = setup(() => reply(200, SAMPLE_POST));

    const err = await failure(gateway.getPost(0));

    expect(err.statusCode).toBe(400);
    expect(err.detail).toBe("id: Post id must be a positive integer");
    expect(transport.calls).toHaveLength(0);
  });

  it("forwards the request id upstream", async () => {
    const { gateway, transport } = setup(() => reply(200, SAMPLE_POST));

    await gateway.getPost(1, { requestId: "req-1" });

    expect(transport.calls[0]?.headers).toEqual({ "x-request-id": "req-1" });
  });

  it("short-circuits once the breaker opens", async () => {
    const { gateway, transport, breaker } = setup(() => reply(500), {
      maxAttempts: 1,
      breaker: { minRequests: 2, failureThreshold: 1 },
    });
    const transitions: BreakerStateEvent[] = [];
    gateway.on("breaker:state", (e) => transitions.push(e));

    await failure(gateway.getPost(1));
    await failure(gateway.getPost(1));
    expect(breaker.state()).toBe("OPEN");

    const err = await failure(gateway.getPost(1));

    expect(err.statusCode).toBe(503);
    expect(transport.calls).toHaveLength(2);
    expect(transitions).toEqual([{ name: "postsApi", from: "CLOSED", to: "OPEN" }]);
  });

  it("lets one trial through after cooldown and closes on success", async () => {
    let clock = 1_000;
    let release: (o: Outcome) => void = () => undefined;
    const { gateway, transport, breaker } = setup(
      (_req, n) => (n <= 2 ? reply(503) : new Promise<Outcome>((resolve) => (release = resolve))),
      { maxAttempts: 1, breaker: { minRequests: 2, failureThreshold: 1 }, gateway: { now: () => clock } }
    );

    await failure(gateway.getPost(1));
    await failure(gateway.getPost(1));
    expect(breaker.state()).toBe("OPEN");

    clock += 1_500;
    const trial = gateway.getPost(1);
    const concurrent = await failure(gateway.getPost(1));

    expect(breaker.state()).toBe("HALF_OPEN");
    expect(concurrent.statusCode).toBe(503);

    release(reply(200, SAMPLE_POST));
    await expect(trial).resolves.toEqual(SAMPLE_POST);
    expect(breaker.state()).toBe("CLOSED");
    expect(transport.calls).toHaveLength(3);
  });

  it("does not let a call admitted before opening decide the trial", async () => {
    let clock = 1_000;
    const pending: Array<(o: Outcome) => void> = [];
    const { gateway, breaker } = setup(
      (_req, n) => (n === 1 || n === 4 ? new Promise<Outcome>((resolve) => pending.push(resolve)) : reply(503)),
      { maxAttempts: 1, breaker: { minRequests: 2, failureThreshold: 1 }, gateway: { now: () => clock } }
    );

    const early = gateway.getPost(1);
    await failure(gateway.getPost(1));
    await failure(gateway.getPost(1));
    expect(breaker.state()).toBe("OPEN");

    clock += 1_500;
    const trial = gateway.getPost(1);
    expect(breaker.state()).toBe("HALF_OPEN");

    pending[0]?.(reply(200, SAMPLE_POST));
    await expect(early).resolves.toEqual(SAMPLE_POST);
    expect(breaker.state()).toBe("HALF_OPEN");
    expect(breaker.snapshot().halfOpenInFlight).toBe(1);

    pending[1]?.(reply(200, SAMPLE_POST));
    await expect(trial).resolves.toEqual(SAMPLE_POST);
    expect(breaker.state()).toBe("CLOSED");
  });

  it("does not start a retry that would end past the deadline", async () => {
    const { gateway, transport } = setup(() => reply(503), { baseDelayMs: 50 });

    const err = await failure(gateway.listPosts({}, { timeoutMs: 20 }));

    expect(err.statusCode).toBe(503);
    expect(transport.calls).toHaveLength(1);
  });

  it("makes no call when the caller already gave up", async () => {
    const { gateway, transport } = setup(() => reply(200, []));
    const ac = new AbortController();
    ac.abort();

    const err = await failure(gateway.listPosts({}, { signal: ac.signal }));

    expect(err.statusCode).toBe(503);
    expect(err.detail).toBe("The request was cancelled before the upstream service responded.");
    expect(transport.calls).toHaveLength(0);
  });

  it("abandons an attempt the caller aborts without recording it", async () => {
    const ac = new AbortController();
    const { gateway, transport, breaker } = setup(
      (req) =>
        new Promise<Outcome>((resolve) => {
          req.signal?.addEventListener("abort", () =>
            resolve({ kind: "transport-failure", reason: "aborted", cause: new Error("aborted") })
          );
        })
    );
    const rejected: string[] = [];
    gateway.on("request:rejected", (e) => rejected.push(e.reason));

    const call = failure(gateway.getPost(1, { signal: ac.signal }));
    ac.abort();
    const err = await call;

    expect(err.statusCode).toBe(503);
    expect(err.detail).toBe("The request was cancelled before the upstream service responded.");
    expect(transport.calls).toHaveLength(1);
    expect(rejected).toEqual(["aborted"]);
    expect(breaker.snapshot()).toMatchObject({ state: "CLOSED", windowCount: 0, windowFailures: 0 });
  });

  it("treats a timeout cut short by the caller's deadline as a deadline", async () => {
    let clock = 5_000;
    const { gateway, transport, breaker } = setup(
      (req) => {
        // the transport timer can fire just before the deadline by the gateway's clock
        clock += req.timeoutMs - 1;
        return { kind: "transport-failure", reason: "timeout", cause: new Error("headers timeout") };
      },
      { gateway: { now: () => clock } }
    );

    const err = await failure(gateway.getPost(1, { timeoutMs: 50 }));

    expect(transport.calls.map((c) => c.timeoutMs)).toEqual([50]);
    expect(err.statusCode).toBe(503);
    expect(err.detail).toBe("The request deadline expired before the upstream service responded.");
    expect(breaker.snapshot()).toMatchObject({ windowCount: 0, windowFailures: 0 });
  });

  it("counts an upstream timeout that the deadline did not cap", async () => {
    const { gateway, breaker } = setup(
      () => ({ kind: "transport-failure", reason: "timeout", cause: new Error("headers timeout") }),
      { maxAttempts: 1 }
    );

    const err = await failure(gateway.getPost(1, { timeoutMs: 60_000 }));

    expect(err.detail).toBe("Service temporarily unavailable. Please try again later.");
    expect(breaker.snapshot()).toMatchObject({ windowCount: 1, windowFailures: 1 });
  });

  it("uses the fallback chosen at construction", async () => {
    const { gateway } = setup(() => reply(503), {
      maxAttempts: 1,
      gateway: {
        fallback: (f) =>
          new DomainError({ title: "Posts Offline", detail: `${f.kind} on ${f.operation}`, statusCode: 503 }),
      },
    });

    const err = await failure(gateway.listPosts({}));

    expect(err.title).toBe("Posts Offline");
    expect(err.detail).toBe("classified on list-posts");
  });

  it("wraps anything thrown along the way in a DomainError", async () => {
    const { gateway } = setup(() => {
      throw new Error("socket exploded");
    });

    const err = await failure(gateway.getPost(1));

    expect(err.statusCode).toBe(500);
    expect(err.title).toBe("Internal Server Error");
    expect(err.detail).not.toContain("socket exploded");
  });
});

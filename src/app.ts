// src/app.ts
import { randomUUID } from "node:crypto";
import express, { type NextFunction, type Request, type Response } from "express";
import { badRequest, notFound, toDomainError, type DomainError } from "./errors.js";
import type { ResilientGateway } from "./gateway.js";
import type { Logger } from "./logger.js";
import { buildProblemResponse } from "./problem.js";
import { parseSearchCriteria, validationError } from "./validation.js";

const REQUEST_ID_HEADER = "X-Request-ID";

export interface AppDeps {
  gateway: ResilientGateway;
  logger: Logger;
}

interface RequestContext {
  requestId: string;
  log: Logger;
}

function parseId(raw: string | undefined): number | undefined {
  if (raw === undefined || !/^\d+$/.test(raw)) return undefined;
  const id = Number(raw);
  return id >= 1 && Number.isSafeInteger(id) ? id : undefined;
}

function sendProblem(res: Response, error: DomainError): void {
  const problem = buildProblemResponse(error);
  res.status(problem.status).set(problem.headers).send(JSON.stringify(problem.body));
}

/**
 * HTTP surface over the gateway, versioned under /api/v1.
 */
export function createApp({ gateway, logger }: AppDeps) {
  const app = express();
  app.disable("x-powered-by");

  const contexts = new WeakMap<Request, RequestContext>();
  const context = (req: Request): RequestContext => contexts.get(req) ?? { requestId: randomUUID(), log: logger };

  app.use((req, res, next) => {
    const requestId = req.get(REQUEST_ID_HEADER) ?? randomUUID();
    res.set(REQUEST_ID_HEADER, requestId);
    contexts.set(req, {
      requestId,
      log: logger.child({
        requestId,
        httpMethod: req.method,
        requestUri: req.path,
        clientIp: req.get("X-Forwarded-For")?.split(",")[0]?.trim() ?? req.socket.remoteAddress,
      }),
    });
    next();
  });

  app.get("/health", (_req, res) => {
    const snapshot = gateway.snapshot();
    res.json({ status: snapshot.breaker.state === "CLOSED" ? "UP" : "DEGRADED", breaker: snapshot.breaker });
  });

  app.get("/api/v1/posts", async (req, res, next) => {
    const { requestId, log } = context(req);
    try {
      const parsed = parseSearchCriteria(req.query);
      if (!parsed.ok) throw validationError(parsed.violations);

      log.debug({ criteria: parsed.criteria }, "getting posts");
      const posts = await gateway.listPosts(parsed.criteria, { requestId });
      log.debug(`returning ${posts.length} posts`);
      res.json(posts);
    } catch (err) {
      next(err);
    }
  });

  app.get("/api/v1/posts/:id", async (req, res, next) => {
    const { requestId, log } = context(req);
    try {
      const id = parseId(req.params.id);
      if (id === undefined) throw badRequest("id: Post id must be a positive integer");

      const include = req.query.include;
      const includeComments = typeof include === "string" && include.toLowerCase() === "comments";
      log.debug({ id, includeComments }, "getting post");

      const post = includeComments
        ? await gateway.getPostWithComments(id, { requestId })
        : await gateway.getPost(id, { requestId });
      res.json(post);
    } catch (err) {
      next(err);
    }
  });

  app.get("/api/v1/posts/:postId/comments", async (req, res, next) => {
    const { requestId, log } = context(req);
    try {
      const postId = parseId(req.params.postId);
      if (postId === undefined) throw badRequest("postId: Post id must be a positive integer");

      const comments = await gateway.getComments(postId, { requestId });
      log.debug(`returning ${comments.length} comments for post ${postId}`);
      res.json(comments);
    } catch (err) {
      next(err);
    }
  });

  app.use((req, _res, next) => {
    next(notFound(`route ${req.method} ${req.path}`));
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const error = toDomainError(err);
    const { log } = context(req);
    if (error.statusCode >= 500) log.error({ err: error, cause: error.cause }, `[${error.title}] ${error.detail}`);
    else log.warn(`[${error.title}] ${error.detail}`);
    sendProblem(res, error);
  });

  return app;
}

// src/operations.ts
import { z } from "zod";
import type { Comment, HttpMethod, Post, UpstreamOptions } from "./types.js";

export const commentSchema: z.ZodType<Comment> = z.object({
  postId: z.number().int(),
  id: z.number().int(),
  name: z.string(),
  email: z.string(),
  body: z.string(),
});

export const postSchema: z.ZodType<Post> = z.object({
  userId: z.number().int(),
  id: z.number().int(),
  title: z.string(),
  body: z.string(),
  comments: z.array(commentSchema).optional(),
});

export type OperationName = "list-posts" | "post-by-id" | "post-with-comments" | "comments-for-post";

/**
 * Static description of one upstream query.
 *
 * `pathTemplate` placeholders: `{posts}` and `{comments}` come from the
 * upstream configuration, `{id}` from the call.
 * Without `empty` the operation requires a body and an empty one is
 * treated as a missing resource. `empty` builds a fresh value per call.
 */
export interface Operation<T> {
  readonly name: OperationName;
  readonly method: HttpMethod;
  readonly pathTemplate: string;
  readonly fixedQuery?: Readonly<Record<string, string>>;
  readonly schema: z.ZodType<T>;
  readonly empty?: () => T;
}

export const LIST_POSTS: Operation<Post[]> = {
  name: "list-posts",
  method: "GET",
  pathTemplate: "{posts}",
  schema: z.array(postSchema),
  empty: () => [],
};

export const POST_BY_ID: Operation<Post> = {
  name: "post-by-id",
  method: "GET",
  pathTemplate: "{posts}/{id}",
  schema: postSchema,
};

export const POST_WITH_COMMENTS: Operation<Post> = {
  name: "post-with-comments",
  method: "GET",
  pathTemplate: "{posts}/{id}",
  fixedQuery: { _embed: "comments" },
  schema: postSchema,
};

export const COMMENTS_FOR_POST: Operation<Comment[]> = {
  name: "comments-for-post",
  method: "GET",
  pathTemplate: "{posts}/{id}{comments}",
  schema: z.array(commentSchema),
  empty: () => [],
};

/** An operation bound to the values of one call. */
export interface OperationRequest<T> {
  operation: Operation<T>;
  id?: number;
  query?: URLSearchParams;
  /** Human-readable label used in error details, e.g. "Post with id 7". */
  resource: string;
}

export function buildUrl<T>(upstream: Pick<UpstreamOptions, "baseUrl" | "postsPath" | "commentsPath">, req: OperationRequest<T>): string {
  const path = req.operation.pathTemplate
    .replace("{posts}", upstream.postsPath)
    .replace("{comments}", upstream.commentsPath)
    .replace("{id}", req.id === undefined ? "" : encodeURIComponent(String(req.id)));

  const url = new URL(upstream.baseUrl.replace(/\/+$/, "") + path);
  req.query?.forEach((v, k) => url.searchParams.append(k, v));
  for (const [k, v] of Object.entries(req.operation.fixedQuery ?? {})) url.searchParams.append(k, v);
  return url.toString();
}

/**
 * wysiwyg-kit - Comments
 *
 * Zod schemas for comment payloads coming from the host (a create-comment
 * handler, or threads loaded from wherever the host keeps them).
 */

import { z } from 'zod';
import type { Comment, CommentResult } from './types';

export const commentSchema = z.object({
  content: z.string(),
  author: z.object({
    name: z.string(),
    avatar: z.string().url(),
  }),
  createdAt: z.number().int().nonnegative(),
});

export const commentThreadsSchema = z.record(z.string(), z.array(commentSchema));

export type CommentThreads = Record<string, Comment[]>;

export type ThreadsResult =
  | { success: true; threads: CommentThreads }
  | { success: false; error: string };

const firstIssue = (error: z.ZodError): string => {
  const issue = error.errors[0];
  if (!issue) return 'Invalid value';
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
};

/**
 * Validate a comment returned by the host's create-comment handler.
 */
export function parseComment(value: unknown): CommentResult {
  const result = commentSchema.safeParse(value);
  if (!result.success) {
    return { success: false, error: `Invalid comment: ${firstIssue(result.error)}` };
  }
  return { success: true, comment: result.data };
}

/**
 * Parse stored threads (serialized path -> comments, oldest first) for initState().
 */
export function parseCommentThreads(json: string): ThreadsResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    return { success: false, error: `JSON parse error: ${e instanceof Error ? e.message : String(e)}` };
  }

  const result = commentThreadsSchema.safeParse(parsed);
  if (!result.success) {
    return { success: false, error: `Invalid comment threads: ${firstIssue(result.error)}` };
  }
  return { success: true, threads: result.data };
}

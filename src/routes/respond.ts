import type { Response } from 'express';
import createError from 'http-errors';
import type { z } from 'zod';
import type { ToolResult } from '../types.js';

export function httpStatusFor(result: ToolResult<object>): number {
  switch (result.status) {
    case 'success':
      return 200;
    case 'not_found':
      return 404;
    case 'error':
      return result.kind === 'persistence' ? 500 : 400;
  }
}

export function sendResult(res: Response, result: ToolResult<object>): Response {
  return res.status(httpStatusFor(result)).json(result);
}

/** Shape check only; domain rules (empty lists, age range) stay in the services. */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? `${issue.path.join('.')}: ` : '';
    throw createError(400, `${where}${issue?.message ?? 'invalid request body'}`);
  }
  return parsed.data;
}

import type { Request, Response, NextFunction } from 'express';
import {
  PathEscapeError,
  ReadFailure,
  TaskFailedError,
  errorMessage,
} from '../errors.js';
import type { Logger } from '../logger.js';

interface ErrorReply {
  status: number;
  body: { error: string; detail: string };
}

export function toErrorReply(err: unknown): ErrorReply {
  if (err instanceof PathEscapeError) {
    return { status: 403, body: { error: 'Access denied', detail: err.reason } };
  }
  if (err instanceof ReadFailure) {
    return err.kind === 'not-found'
      ? { status: 404, body: { error: 'File not found', detail: err.message } }
      : { status: 500, body: { error: 'Read failed', detail: err.message } };
  }
  if (err instanceof TaskFailedError) {
    return { status: err.status, body: { error: 'Task failed', detail: err.detail } };
  }
  return { status: 500, body: { error: 'Internal error', detail: errorMessage(err) } };
}

export function createErrorHandler(logger: Logger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const reply = toErrorReply(err);
    if (reply.status >= 500 && !(err instanceof TaskFailedError)) {
      logger.error('Unhandled error', { method: req.method, path: req.path, error: err });
    }
    res.status(reply.status).json(reply.body);
  };
}

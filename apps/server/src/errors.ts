import type { ErrorRequestHandler, Response } from 'express';
import type { Logger } from 'pino';
import { ImportConflictError, ValidationError, isTaskError } from '@tasklane/core';
import type { TaskError, TaskErrorCode } from '@tasklane/core';
import { toWireFieldErrors } from './wire.js';

export interface ErrorBody {
  code: string;
  message: string;
  [extra: string]: unknown;
}

/** Errors raised by express's body parser carry a `type` and an HTTP `status` */
interface BodyParserError {
  type: string;
  status: number;
  message: string;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return err instanceof Error
    && 'type' in err && typeof err.type === 'string'
    && 'status' in err && typeof err.status === 'number';
}

const STATUS_BY_CODE: Record<TaskErrorCode, number> = {
  not_found: 404,
  validation_error: 422,
  conflict: 409,
  precondition_failed: 412,
};

function sendError(res: Response, status: number, body: ErrorBody): void {
  res.status(status).json(body);
}

function sendTaskError(res: Response, err: TaskError): number {
  const status = STATUS_BY_CODE[err.code];
  const body: ErrorBody = { code: err.code, message: err.message };

  if (err instanceof ValidationError) {
    body.field_errors = toWireFieldErrors(err.fieldErrors);
  }
  if (err instanceof ImportConflictError) {
    body.conflicting_ids = err.conflictingIds;
    res.setHeader('X-Conflicting-IDs', JSON.stringify(err.conflictingIds));
  }

  sendError(res, status, body);
  return status;
}

/**
 * Maps thrown errors to responses. Domain errors get their status and are
 * logged at warn; anything else is a 500 logged with its stack.
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (isTaskError(err)) {
      const status = sendTaskError(res, err);
      logger.warn({ code: err.code, status, method: req.method, path: req.path }, err.message);
      return;
    }

    if (isBodyParserError(err) && err.status < 500) {
      const code = err.type === 'entity.parse.failed' ? 'invalid_json' : 'bad_request';
      sendError(res, err.status, { code, message: err.message });
      logger.warn({ code, status: err.status, method: req.method, path: req.path }, err.message);
      return;
    }

    logger.error({ err, method: req.method, path: req.path }, 'Unhandled error');
    sendError(res, 500, { code: 'internal_error', message: 'Internal server error' });
  };
}

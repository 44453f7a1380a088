/**
 * Error taxonomy for the HTTP surface and the single mapping from any thrown
 * value to a status code and envelope.
 */

import type { ErrorRequestHandler, RequestHandler } from 'express';
import { getLogger } from '@logtape/logtape';
import {
  failure, formatFieldError,
  type ApiResponse, type DataResult, type FieldError, type TaskResult,
} from '@todo-list/core';

export const VALIDATION_FAILED_MESSAGE = 'Validation failed';
export const MALFORMED_BODY_MESSAGE = 'The request body is not valid. Check the JSON format.';
export const INTERNAL_ERROR_MESSAGE = 'Internal server error. Please try again later.';
export const ROUTE_NOT_FOUND_MESSAGE = 'Resource not found';

const logger = getLogger(['todo-list', 'http']);

export class ValidationError extends Error {
  readonly errors: readonly FieldError[];

  constructor(errors: readonly FieldError[]) {
    super(VALIDATION_FAILED_MESSAGE);
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

export class NotFoundError extends Error {
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Task not found with id: ${taskId}`);
    this.name = 'NotFoundError';
    this.taskId = taskId;
  }
}

export class MalformedRequestError extends Error {
  constructor(message: string = MALFORMED_BODY_MESSAGE) {
    super(message);
    this.name = 'MalformedRequestError';
  }
}

export function invalidParameter(name: string): MalformedRequestError {
  return new MalformedRequestError(`Parameter '${name}' has an invalid format`);
}

/** Data of a successful result; throws the matching error otherwise */
export function unwrap<T>(result: DataResult<T>): T {
  switch (result.type) {
    case 'success': return result.data;
    case 'not-found': throw new NotFoundError(result.taskId);
    case 'invalid': throw new ValidationError(result.errors);
  }
}

export function ensureFound(result: TaskResult): void {
  if (result.type === 'not-found') throw new NotFoundError(result.taskId);
}

/**
 * express.json() rejects bad bodies (unparseable, too large, unsupported
 * charset or encoding, aborted) with an http-errors error carrying a `type`
 * and a 4xx `status`.
 */
function isBodyParserRejection(err: unknown): boolean {
  if (!(err instanceof Error) || !('type' in err) || !('status' in err)) return false;
  return typeof err.type === 'string' && typeof err.status === 'number' && err.status >= 400 && err.status < 500;
}

export interface ErrorResponse {
  readonly status: number;
  readonly body: ApiResponse<null>;
}

export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof ValidationError) {
    return { status: 400, body: failure(err.message, err.errors.map(formatFieldError)) };
  }
  if (err instanceof NotFoundError) return { status: 404, body: failure(err.message) };
  if (err instanceof MalformedRequestError) return { status: 400, body: failure(err.message) };
  if (isBodyParserRejection(err)) return { status: 400, body: failure(MALFORMED_BODY_MESSAGE) };
  return { status: 500, body: failure(INTERNAL_ERROR_MESSAGE) };
}

export const errorHandler = (): ErrorRequestHandler => (err: unknown, req, res, _next) => {
  const { status, body } = toErrorResponse(err);
  if (status >= 500) {
    logger.error('Unhandled error on {method} {url}: {error}', { method: req.method, url: req.originalUrl, error: err });
  } else {
    logger.warn('{method} {url} rejected with {status}: {message}', {
      method: req.method,
      url: req.originalUrl,
      status,
      message: body.message,
    });
  }
  res.status(status).json(body);
};

export const notFoundHandler = (): RequestHandler => (_req, res) => {
  res.status(404).json(failure(ROUTE_NOT_FOUND_MESSAGE));
};

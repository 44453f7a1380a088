import type { RequestHandler } from 'express';
import { getLogger } from '@logtape/logtape';

const logger = getLogger(['todo-list', 'http']);

// request logging middleware
export const requestLogger = (): RequestHandler => (req, res, next) => {
  const started = Date.now();
  res.on('finish', () => {
    logger.info('{method} {url} {status} {duration}ms', {
      method: req.method,
      url: req.originalUrl,
      status: res.statusCode,
      duration: Date.now() - started,
    });
  });
  next();
};

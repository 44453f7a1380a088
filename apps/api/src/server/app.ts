import express, { type Express } from 'express';
import cors from 'cors';
import type { TaskService } from '@todo-list/core';
import { createTasksRouter, TASKS_BASE_PATH } from './routes/tasks.js';
import { requestLogger } from './request-logger.js';
import { errorHandler, notFoundHandler } from './errors.js';
import type { OpenApiDocument } from '../openapi.js';

export const API_DOCS_PATH = '/v3/api-docs';

export interface AppOptions {
  service: TaskService;
  /** Served at /v3/api-docs when given */
  openApiDocument?: OpenApiDocument;
}

export function createApp({ service, openApiDocument }: AppOptions): Express {
  const app = express();
  app.disable('x-powered-by');

  // Logged first so rejected bodies still show up
  app.use(requestLogger());
  app.use(cors());
  app.use(express.json());

  app.use(TASKS_BASE_PATH, createTasksRouter(service));

  if (openApiDocument) {
    app.get(API_DOCS_PATH, (_req, res) => {
      res.json(openApiDocument);
    });
  }

  app.use(notFoundHandler());
  app.use(errorHandler());
  return app;
}

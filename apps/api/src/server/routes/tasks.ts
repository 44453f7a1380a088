import { Router } from 'express';
import { success, successMessage, type TaskService } from '@todo-list/core';
import { unwrap, ensureFound } from '../errors.js';
import { parseListQuery, parseTaskId, readBody } from '../params.js';

export const TASKS_BASE_PATH = '/api/v1/tasks';

export function createTasksRouter(service: TaskService): Router {
  const router = Router();

  router.post('/', (req, res) => {
    const task = unwrap(service.create(readBody(req.body)));
    res.status(201).json(success('Task created successfully', task));
  });

  router.get('/', (req, res) => {
    const page = service.list(parseListQuery(req.query));
    res.json(success('Tasks retrieved successfully', page));
  });

  router.get('/:id', (req, res) => {
    const task = unwrap(service.getById(parseTaskId(req.params.id)));
    res.json(success('Task found', task));
  });

  router.put('/:id', (req, res) => {
    const id = parseTaskId(req.params.id);
    const task = unwrap(service.update(id, readBody(req.body)));
    res.json(success('Task updated successfully', task));
  });

  router.patch('/:id/toggle', (req, res) => {
    const task = unwrap(service.toggle(parseTaskId(req.params.id)));
    const message = task.completed ? 'Task marked as completed' : 'Task marked as pending';
    res.json(success(message, task));
  });

  router.delete('/:id', (req, res) => {
    ensureFound(service.delete(parseTaskId(req.params.id)));
    res.json(successMessage('Task deleted successfully'));
  });

  return router;
}

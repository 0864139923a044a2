import { Router } from 'express';
import type { Request } from 'express';
import type { Logger } from 'pino';
import {
  createTask,
  requireTask,
  updateTask,
  deleteTask,
  listTasks,
  exportTasks,
  importTasks,
  etagFor,
  parseOrThrow,
  taskInputSchema,
  taskListQuerySchema,
  importBatchSchema,
  importOptionsSchema,
} from '@tasklane/core';
import type { TaskDb, Preconditions } from '@tasklane/core';
import { fromWire, fromWireList, toWirePage, toWireTask } from '../wire.js';

/** A single header value; a repeated header keeps its first value */
function header(req: Request, name: string): string | undefined {
  const value = req.headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

function preconditionsOf(req: Request): Preconditions {
  return {
    ifUnmodifiedSince: header(req, 'If-Unmodified-Since'),
    ifMatch: header(req, 'If-Match'),
  };
}

export function createTaskRouter(db: TaskDb, logger: Logger): Router {
  const router = Router();

  router.post('/tasks', (req, res) => {
    const input = parseOrThrow(taskInputSchema, fromWire(req.body));
    const task = createTask(db, input);
    logger.info({ taskId: task.id, parentId: task.parentId }, 'Task created');

    res.status(201)
      .location(`${req.baseUrl}/tasks/${encodeURIComponent(task.id)}`)
      .setHeader('ETag', etagFor(task));
    res.json(toWireTask(task));
  });

  router.get('/tasks', (req, res) => {
    const query = parseOrThrow(taskListQuerySchema, fromWire(req.query), 'Invalid list query');
    res.json(toWirePage(listTasks(db, query)));
  });

  // Registered before /tasks/:id so "export" and "import" are not read as ids
  router.get('/tasks/export', (_req, res) => {
    const tasks = exportTasks(db);
    logger.info({ count: tasks.length }, 'Tasks exported');
    res.json(tasks.map(toWireTask));
  });

  router.post('/tasks/import', (req, res) => {
    const options = parseOrThrow(importOptionsSchema, fromWire(req.query), 'Invalid import options');
    const records = parseOrThrow(importBatchSchema, fromWireList(req.body), 'Invalid import payload');
    const result = importTasks(db, records, options);

    logger.info({
      count: result.importedCount,
      onConflict: options.onConflict,
      validateOnly: result.validateOnly,
      idempotencyKey: header(req, 'Idempotency-Key'),
    }, result.validateOnly ? 'Import validated' : 'Tasks imported');

    res.status(result.validateOnly ? 200 : 201).json({ imported_count: result.importedCount });
  });

  router.get('/tasks/:id', (req, res) => {
    const task = requireTask(db, req.params.id);
    res.setHeader('ETag', etagFor(task));
    res.json(toWireTask(task));
  });

  router.patch('/tasks/:id', (req, res) => {
    const task = updateTask(db, req.params.id, fromWire(req.body), { preconditions: preconditionsOf(req) });
    res.setHeader('ETag', etagFor(task));
    res.json(toWireTask(task));
  });

  router.delete('/tasks/:id', (req, res) => {
    const { taskId, descendantCount } = deleteTask(db, req.params.id);
    logger.info({ taskId, descendantCount }, 'Task deleted');
    res.status(204).end();
  });

  return router;
}

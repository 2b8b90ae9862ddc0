import express, { Request, Response } from 'express';
import { TaskManager } from '../application/services/TaskManager';
import { SseStreamAdapter, resolveFromSequence } from '../infrastructure/streaming/SseStreamAdapter';
import { handleError } from './handleError';
import {
  GenerateScriptBody,
  eventsQuerySchema,
  generateScriptSchema,
  idParamSchema,
  validateBody,
  validateParams,
  validateQuery
} from './validation';

/**
 * Create task routes using the TaskManager.
 */
export function createTaskRoutes(taskManager: TaskManager, sse: SseStreamAdapter) {
  const router = express.Router();

  // List tasks
  router.get('/tasks', async (req: Request, res: Response) => {
    try {
      res.json(taskManager.listTasks());
    } catch (err) {
      handleError(err, res);
    }
  });

  // Create task without starting it
  router.post('/tasks', validateBody(generateScriptSchema), async (req: Request, res: Response) => {
    try {
      const { client_key, ...request }: GenerateScriptBody = req.body;
      const task = await taskManager.createTask(request, client_key);
      res.status(201).json(task);
    } catch (err) {
      handleError(err, res);
    }
  });

  // Get task status
  router.get('/tasks/:id', validateParams(idParamSchema), async (req: Request, res: Response) => {
    try {
      res.json(taskManager.getStatus(req.params.id));
    } catch (err) {
      handleError(err, res);
    }
  });

  router.post('/tasks/:id/start', validateParams(idParamSchema), async (req: Request, res: Response) => {
    try {
      res.json(await taskManager.start(req.params.id));
    } catch (err) {
      handleError(err, res);
    }
  });

  router.post('/tasks/:id/pause', validateParams(idParamSchema), async (req: Request, res: Response) => {
    try {
      res.json(await taskManager.pause(req.params.id));
    } catch (err) {
      handleError(err, res);
    }
  });

  router.post('/tasks/:id/resume', validateParams(idParamSchema), async (req: Request, res: Response) => {
    try {
      res.json(await taskManager.resume(req.params.id));
    } catch (err) {
      handleError(err, res);
    }
  });

  // Attach or reattach to the task's event stream
  router.get(
    '/tasks/:id/events',
    validateParams(idParamSchema),
    validateQuery(eventsQuerySchema),
    async (req: Request, res: Response) => {
      try {
        const id = req.params.id;
        taskManager.getStatus(id);
        const from = resolveFromSequence(req.header('Last-Event-ID'), req.query.from);
        await sse.stream(res, id, from);
      } catch (err) {
        handleError(err, res);
      }
    }
  );

  router.get('/tasks/:id/transcript', validateParams(idParamSchema), async (req: Request, res: Response) => {
    try {
      res.json(taskManager.getFullTranscript(req.params.id));
    } catch (err) {
      handleError(err, res);
    }
  });

  router.get('/tasks/:id/checkpoint', validateParams(idParamSchema), async (req: Request, res: Response) => {
    try {
      res.json(await taskManager.getCheckpoint(req.params.id));
    } catch (err) {
      handleError(err, res);
    }
  });

  // Delete a task that is not running
  router.delete('/tasks/:id', validateParams(idParamSchema), async (req: Request, res: Response) => {
    try {
      const id = req.params.id;
      await taskManager.deleteTask(id);
      res.json({ success: true, id });
    } catch (err) {
      handleError(err, res);
    }
  });

  return router;
}

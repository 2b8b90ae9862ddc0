import express, { Request, Response } from 'express';
import { TaskManager } from '../application/services/TaskManager';
import { SseStreamAdapter } from '../infrastructure/streaming/SseStreamAdapter';
import { handleError } from './handleError';
import {
  GenerateScriptBody,
  clientKeyParamSchema,
  generateScriptSchema,
  idParamSchema,
  validateBody,
  validateParams
} from './validation';

/**
 * Streaming generation endpoints. Responses use snake_case fields.
 */
export function createGenerationRoutes(taskManager: TaskManager, sse: SseStreamAdapter) {
  const router = express.Router();

  // Create, start and stream a task in one request
  router.post('/stream/generate-script', validateBody(generateScriptSchema), async (req: Request, res: Response) => {
    try {
      const { client_key, ...request }: GenerateScriptBody = req.body;
      const task = await taskManager.createTask(request, client_key);
      await taskManager.start(task.id);
      await sse.stream(res, task.id, 0);
    } catch (err) {
      handleError(err, res);
    }
  });

  router.delete('/stream/cancel/:id', validateParams(idParamSchema), async (req: Request, res: Response) => {
    try {
      const result = await taskManager.cancel(req.params.id);
      res.json({ task_id: result.taskId, cancelled: result.cancelled, status: result.status });
    } catch (err) {
      handleError(err, res);
    }
  });

  router.get('/generation-status/:clientKey', validateParams(clientKeyParamSchema), async (req: Request, res: Response) => {
    try {
      const view = taskManager.getStatusByClientKey(req.params.clientKey);
      res.json({
        client_key: view.clientKey,
        task_id: view.taskId,
        status: view.status,
        current_stage: view.currentStage,
        episodes_completed: view.episodesCompleted,
        total_episodes: view.totalEpisodes,
        progress: view.progress,
        error: view.error
      });
    } catch (err) {
      handleError(err, res);
    }
  });

  router.get('/generation-transcript/:clientKey', validateParams(clientKeyParamSchema), async (req: Request, res: Response) => {
    try {
      const view = taskManager.getTranscriptByClientKey(req.params.clientKey);
      res.json({
        task_id: view.taskId,
        status: view.status,
        full_script: view.transcript,
        episodes_completed: view.episodesCompleted,
        total_episodes: view.totalEpisodes
      });
    } catch (err) {
      handleError(err, res);
    }
  });

  return router;
}

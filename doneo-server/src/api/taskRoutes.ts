import express, { Request, Response } from 'express';
import { ProjectService } from '../application/services/ProjectService';
import { ProjectChatService } from '../application/services/ProjectChatService';
import { ILogger } from '../domain/common/ILogger';
import { actorOf, handleError } from './http';
import {
  acceptTaskSchema,
  createTaskSchema,
  idParamSchema,
  parseInput,
  subtaskInputSchema,
  subtaskParamSchema,
  taskParamSchema,
  updateTaskSchema
} from './validation';

/**
 * Task registry routes.
 */
export function createTaskRoutes(
  projectService: ProjectService,
  chatService: ProjectChatService,
  logger: ILogger
) {
  const router = express.Router();

  router.post('/projects/:id/tasks', async (req: Request, res: Response) => {
    try {
      const { id } = parseInput(idParamSchema, req.params, 'Invalid URL parameters');
      const payload = parseInput(createTaskSchema, req.body, 'Invalid request body');
      const task = await chatService.createTask(id, actorOf(req), payload);
      res.status(201).json(task);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  // Task detail: sorted subtasks and the task's discussion
  router.get('/projects/:id/tasks/:taskId', async (req: Request, res: Response) => {
    try {
      const { id, taskId } = parseInput(taskParamSchema, req.params, 'Invalid URL parameters');
      const detail = await projectService.getTaskDetail(id, actorOf(req), taskId);
      res.json(detail);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.patch('/projects/:id/tasks/:taskId', async (req: Request, res: Response) => {
    try {
      const { id, taskId } = parseInput(taskParamSchema, req.params, 'Invalid URL parameters');
      const changes = parseInput(updateTaskSchema, req.body, 'Invalid request body');
      const task = await chatService.updateTask(id, actorOf(req), taskId, changes);
      res.json(task);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.post('/projects/:id/tasks/:taskId/toggle', async (req: Request, res: Response) => {
    try {
      const { id, taskId } = parseInput(taskParamSchema, req.params, 'Invalid URL parameters');
      const message = await chatService.toggleTaskStatus(id, actorOf(req), taskId);
      res.json(message);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.post('/projects/:id/tasks/:taskId/accept', async (req: Request, res: Response) => {
    try {
      const { id, taskId } = parseInput(taskParamSchema, req.params, 'Invalid URL parameters');
      const { message } = parseInput(acceptTaskSchema, req.body ?? {}, 'Invalid request body');
      const task = await chatService.acceptTask(id, actorOf(req), taskId, message);
      res.json(task);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.post('/projects/:id/tasks/:taskId/subtasks', async (req: Request, res: Response) => {
    try {
      const { id, taskId } = parseInput(taskParamSchema, req.params, 'Invalid URL parameters');
      const subtask = parseInput(subtaskInputSchema, req.body, 'Invalid request body');
      const task = await chatService.addSubtask(id, actorOf(req), taskId, subtask);
      res.status(201).json(task);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.post('/projects/:id/tasks/:taskId/subtasks/:subtaskId/toggle', async (req: Request, res: Response) => {
    try {
      const { id, taskId, subtaskId } = parseInput(subtaskParamSchema, req.params, 'Invalid URL parameters');
      const message = await chatService.toggleSubtaskStatus(id, actorOf(req), taskId, subtaskId);
      res.json(message);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  return router;
}

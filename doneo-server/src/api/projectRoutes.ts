import express, { Request, Response } from 'express';
import { ProjectService } from '../application/services/ProjectService';
import { ProjectChatService } from '../application/services/ProjectChatService';
import { ILogger } from '../domain/common/ILogger';
import { actorOf, handleError } from './http';
import {
  addMemberSchema,
  commandSchema,
  createProjectSchema,
  idParamSchema,
  muteSchema,
  parseInput,
  updateProjectSchema
} from './validation';

/**
 * Project store, member list, read models and the generic command endpoint.
 */
export function createProjectRoutes(
  projectService: ProjectService,
  chatService: ProjectChatService,
  logger: ILogger
) {
  const router = express.Router();

  // List projects the acting user belongs to
  router.get('/projects', async (req: Request, res: Response) => {
    try {
      const projects = await projectService.listProjects(actorOf(req));
      res.json(projects);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.post('/projects', async (req: Request, res: Response) => {
    try {
      const payload = parseInput(createProjectSchema, req.body, 'Invalid request body');
      const project = await projectService.createProject(payload);
      res.status(201).json(project);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.get('/projects/:id', async (req: Request, res: Response) => {
    try {
      const { id } = parseInput(idParamSchema, req.params, 'Invalid URL parameters');
      const state = await projectService.getChatState(id, actorOf(req));
      res.json(state.project);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.patch('/projects/:id', async (req: Request, res: Response) => {
    try {
      const { id } = parseInput(idParamSchema, req.params, 'Invalid URL parameters');
      const changes = parseInput(updateProjectSchema, req.body, 'Invalid request body');
      const project = await chatService.updateProject(id, actorOf(req), changes);
      res.json(project);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.post('/projects/:id/members', async (req: Request, res: Response) => {
    try {
      const { id } = parseInput(idParamSchema, req.params, 'Invalid URL parameters');
      const member = parseInput(addMemberSchema, req.body, 'Invalid request body');
      const user = await chatService.addMember(id, actorOf(req), member);
      res.status(201).json(user);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.put('/projects/:id/mute', async (req: Request, res: Response) => {
    try {
      const { id } = parseInput(idParamSchema, req.params, 'Invalid URL parameters');
      const { isMuted } = parseInput(muteSchema, req.body, 'Invalid request body');
      const project = await chatService.setMuted(id, actorOf(req), isMuted);
      res.json({ id: project.id, isMuted: project.isMuted });
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  // Published chat state for the acting user
  router.get('/projects/:id/state', async (req: Request, res: Response) => {
    try {
      const { id } = parseInput(idParamSchema, req.params, 'Invalid URL parameters');
      const state = await projectService.getChatState(id, actorOf(req));
      res.json(state);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.get('/projects/:id/audit', async (req: Request, res: Response) => {
    try {
      const { id } = parseInput(idParamSchema, req.params, 'Invalid URL parameters');
      const entries = await projectService.getAuditLog(id, actorOf(req));
      res.json(entries);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  // Any command in its tagged form
  router.post('/projects/:id/commands', async (req: Request, res: Response) => {
    try {
      const { id } = parseInput(idParamSchema, req.params, 'Invalid URL parameters');
      const command = parseInput(commandSchema, req.body, 'Invalid command');
      const result = await chatService.execute(id, actorOf(req), command);
      res.json(result);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  return router;
}

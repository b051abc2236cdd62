import express, { Request, Response } from 'express';
import { ProjectService } from '../application/services/ProjectService';
import { ProjectChatService } from '../application/services/ProjectChatService';
import { ILogger } from '../domain/common/ILogger';
import { actorOf, handleError } from './http';
import { addAttachmentsSchema, idParamSchema, parseInput } from './validation';

/**
 * Attachment catalog routes.
 */
export function createAttachmentRoutes(
  projectService: ProjectService,
  chatService: ProjectChatService,
  logger: ILogger
) {
  const router = express.Router();

  router.post('/projects/:id/attachments', async (req: Request, res: Response) => {
    try {
      const { id } = parseInput(idParamSchema, req.params, 'Invalid URL parameters');
      const { items, linkedTaskId, linkedSubtaskId, caption } = parseInput(addAttachmentsSchema, req.body, 'Invalid request body');
      const attachments = await chatService.addAttachments(id, actorOf(req), items, linkedTaskId, linkedSubtaskId, caption);
      res.status(201).json(attachments);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  // Media browser: by type, then by linked task
  router.get('/projects/:id/attachments/media', async (req: Request, res: Response) => {
    try {
      const { id } = parseInput(idParamSchema, req.params, 'Invalid URL parameters');
      const library = await projectService.getMediaLibrary(id, actorOf(req));
      res.json(library);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  return router;
}

import express, { Request, Response } from 'express';
import { ProjectChatService } from '../application/services/ProjectChatService';
import { ILogger } from '../domain/common/ILogger';
import { actorOf, handleError } from './http';
import {
  idParamSchema,
  imageMessageSchema,
  messageParamSchema,
  parseInput,
  reactionSchema,
  sendMessageSchema,
  systemMessageSchema
} from './validation';

/**
 * Message feed routes.
 */
export function createMessageRoutes(chatService: ProjectChatService, logger: ILogger) {
  const router = express.Router();

  router.post('/projects/:id/messages', async (req: Request, res: Response) => {
    try {
      const { id } = parseInput(idParamSchema, req.params, 'Invalid URL parameters');
      const { content, context, quotedMessageId } = parseInput(sendMessageSchema, req.body, 'Invalid request body');
      const message = await chatService.sendMessage(id, actorOf(req), content, context, quotedMessageId);
      res.status(201).json(message);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.post('/projects/:id/messages/system', async (req: Request, res: Response) => {
    try {
      const { id } = parseInput(idParamSchema, req.params, 'Invalid URL parameters');
      const { content } = parseInput(systemMessageSchema, req.body, 'Invalid request body');
      const message = await chatService.sendSystemMessage(id, actorOf(req), content);
      res.status(201).json(message);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  router.post('/projects/:id/messages/image', async (req: Request, res: Response) => {
    try {
      const { id } = parseInput(idParamSchema, req.params, 'Invalid URL parameters');
      const { imageData, fileName, caption } = parseInput(imageMessageSchema, req.body, 'Invalid request body');
      const message = await chatService.sendImageMessage(id, actorOf(req), imageData, fileName, caption);
      res.status(201).json(message);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  // Toggle the acting user's reaction
  router.post('/projects/:id/messages/:messageId/reactions', async (req: Request, res: Response) => {
    try {
      const { id, messageId } = parseInput(messageParamSchema, req.params, 'Invalid URL parameters');
      const { emoji } = parseInput(reactionSchema, req.body, 'Invalid request body');
      const message = await chatService.addReaction(id, actorOf(req), messageId, emoji);
      res.json(message);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  return router;
}

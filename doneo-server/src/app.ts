import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { ProjectService } from './application/services/ProjectService';
import { ProjectChatService } from './application/services/ProjectChatService';
import { ILogger } from './domain/common/ILogger';
import { AppError } from './domain/common/Errors';
import { CorsConfig } from './infrastructure/config/Config';
import { createProjectRoutes } from './api/projectRoutes';
import { createTaskRoutes } from './api/taskRoutes';
import { createMessageRoutes } from './api/messageRoutes';
import { createAttachmentRoutes } from './api/attachmentRoutes';
import { ACTOR_HEADER } from './api/http';

export interface AppDependencies {
  projectService: ProjectService;
  chatService: ProjectChatService;
  logger: ILogger;
  cors?: CorsConfig;
  /** Upper bound of a JSON body; image messages travel as base64. */
  bodyLimit?: string;
}

/**
 * Build the express application over the services.
 */
export function createApp(deps: AppDependencies): express.Application {
  const { projectService, chatService, logger } = deps;
  const app = express();

  if (deps.cors?.enabled) {
    const origins = deps.cors.origins;
    app.use(cors({
      origin: origins.includes('*') ? true : origins,
      credentials: deps.cors.credentials,
      methods: ['GET', 'POST', 'PUT', 'PATCH', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', ACTOR_HEADER]
    }));
  }
  app.use(express.json({ limit: deps.bodyLimit ?? '15mb' }));

  // Health check
  app.get('/health', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({
        status: 'ok',
        timestamp: Date.now(),
        uptime: process.uptime(),
        projects: await projectService.getProjectCount()
      });
    } catch (err) {
      next(err);
    }
  });

  app.use('/api', createProjectRoutes(projectService, chatService, logger));
  app.use('/api', createTaskRoutes(projectService, chatService, logger));
  app.use('/api', createMessageRoutes(chatService, logger));
  app.use('/api', createAttachmentRoutes(projectService, chatService, logger));

  // Global error handling middleware (malformed JSON bodies end up here)
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    if (err instanceof AppError) {
      return res.status(err.statusCode).json(err.toJSON());
    }

    if (err instanceof SyntaxError) {
      return res.status(400).json({
        error: true,
        message: 'Malformed JSON body',
        code: 'VALIDATION_ERROR'
      });
    }

    logger.error('Server error:', err);
    res.status(500).json({
      error: true,
      message: err.message,
      code: 'INTERNAL_ERROR'
    });
  });

  return app;
}

/**
 * @file Express application: routes over ChatController plus health and
 * error handling. Listening happens in index.ts.
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { ApiResponse, ChatController } from './chat_controller';
import { logger } from '../../utils/logger';

export interface AppOptions {
  controller: ChatController;
  corsOrigins?: string[] | '*';
  health?: () => Record<string, unknown>;
}

type Handler = (req: Request) => Promise<ApiResponse>;

function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req)
      .then(result => {
        res.status(result.statusCode).json(result.body);
      })
      .catch(next);
  };
}

export function createApp(options: AppOptions): Express {
  const { controller } = options;
  const app = express();

  app.use(cors({ origin: options.corsOrigins ?? '*' }));
  app.use(express.json({ limit: '64kb' }));

  app.post('/api/chat', route(req => controller.chat(req.body)));

  app.get('/api/users/:userId/predictions', route(req => controller.predictions(req.params.userId)));

  app.get('/api/users/:userId/suggestions', route(req => controller.suggestions(req.params.userId, req.query.limit)));

  app.get('/api/users/:userId/profile', route(req => controller.getProfile(req.params.userId)));

  app.put('/api/users/:userId/profile', route(req => controller.updateProfile(req.params.userId, req.body)));

  app.post('/api/users/:userId/feedback', route(req => controller.feedback(req.params.userId, req.body)));

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'UP', ...options.health?.() });
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not Found' });
  });

  // Malformed JSON bodies arrive here as SyntaxError with status 400
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Bad Request', details: ['Request body is not valid JSON.'] });
      return;
    }
    logger.error('[API] Unhandled error:', err);
    res.status(500).json({ error: 'Internal Server Error' });
  });

  return app;
}

/**
 * History dashboard web server
 * Pages under /, JSON under /api, stylesheet under /static
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { Server } from 'http';
import { HistoryService } from '../services/HistoryService';
import { LoggingService, toError } from '../services/LoggingService';
import { HtmlTemplates, TemplateProvider } from '../web/TemplateProvider';
import { createPagesRouter } from './routes/pages';
import { createApiRouter } from './routes/stats';

export interface AppOptions {
  history: HistoryService;
  logger: LoggingService;
  templates?: TemplateProvider;
  ignoreDomains?: readonly string[];
  /** Directory served under /static */
  staticDir?: string;
}

/**
 * Build the express app for one history database
 */
export function createApp(options: AppOptions): Express {
  const logger = options.logger;
  const ctx = {
    history: options.history,
    templates: options.templates ?? new HtmlTemplates(),
    ignoreDomains: options.ignoreDomains ?? [],
    logger,
  };

  const app = express();
  app.use(cors());

  app.use((req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    res.on('finish', () => {
      logger.debug(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`);
    });
    next();
  });

  if (options.staticDir) {
    app.use('/static', express.static(options.staticDir));
  }

  app.use('/api', createApiRouter(ctx));
  app.use('/', createPagesRouter(ctx));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: `Not found: ${req.path}` });
  });

  // express recognizes error handlers by their four parameters
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const err = toError(error);
    logger.error(`Unhandled error on ${req.method} ${req.originalUrl}`, err);
    res.status(500).json({ error: err.message });
  });

  return app;
}

/**
 * Listen on the given port; 0 picks a free port
 * @returns The listening server
 */
export function startServer(app: Express, port: number, logger: LoggingService): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once('listening', () => {
      const address = server.address();
      const actualPort = typeof address === 'object' && address !== null ? address.port : port;
      logger.info(`History dashboard running on http://localhost:${actualPort}`);
      resolve(server);
    });
    server.once('error', (error) => {
      logger.error(`Failed to listen on port ${port}`, error);
      reject(error);
    });
  });
}

export default createApp;

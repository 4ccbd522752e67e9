/**
 * Express server setup
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import swaggerUi from 'swagger-ui-express';
import type { Server } from 'http';
import { loadConfig, type ServiceConfig } from './config.js';
import { AppError, RenderEngineError } from './errors.js';
import { API_TITLE, buildOpenApiDocument } from './openapi.js';
import { createRenderRouter } from './routes/render.js';
import { createRenderer } from './services/renderService.js';
import { createWirevizRunner } from './services/wirevizEngine.js';
import type { Renderer } from './types/render.js';
import { logger } from './utils/logger.js';

export const SERVICE_VERSION = '0.4.0';

const log = logger('server');

export interface ServerOptions {
  config: ServiceConfig;
  /** Defaults to the WireViz executable named in the config */
  renderer?: Renderer;
}

export function createDefaultRenderer(config: ServiceConfig): Renderer {
  return createRenderer({
    runner: createWirevizRunner({ command: config.wirevizCommand, timeoutMs: config.renderTimeoutMs }),
    tempDirPrefix: config.tempDirPrefix,
    tempRoot: config.tempRoot,
  });
}

function errorStatus(err: unknown): number {
  if (err instanceof AppError) {
    return err.statusCode;
  }
  if (err instanceof multer.MulterError) {
    return err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
  }
  // body-parser errors (oversized or undecodable text bodies) carry their own 4xx status
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return 500;
}

function errorLabel(err: unknown, status: number): string {
  if (err instanceof RenderEngineError) return 'Render engine error';
  if (err instanceof AppError) return err.code;
  if (err instanceof multer.MulterError) return err.code;
  return status >= 500 ? 'Internal server error' : 'Bad request';
}

export function createServer(options: ServerOptions): express.Application {
  const { config } = options;
  const renderer = options.renderer ?? createDefaultRenderer(config);
  const app = express();

  app.use(
    cors({
      origin: config.corsOrigins.length > 0 ? config.corsOrigins : true,
      methods: ['GET', 'POST', 'OPTIONS'],
      exposedHeaders: ['Content-Disposition'],
    })
  );

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', version: SERVICE_VERSION });
  });

  // API documentation
  const apiDocument = buildOpenApiDocument(SERVICE_VERSION);
  app.get('/doc/openapi.json', (_req: Request, res: Response) => {
    res.json(apiDocument);
  });
  app.use('/doc', swaggerUi.serve, swaggerUi.setup(apiDocument, { customSiteTitle: API_TITLE }));

  app.use(
    createRenderRouter({
      renderer,
      maxUploadBytes: config.maxUploadBytes,
      maxAssetCount: config.maxAssetCount,
      publicBaseUrl: config.publicBaseUrl,
    })
  );

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handling middleware - must be last
  app.use((err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const status = errorStatus(err);
    const message = err instanceof Error ? err.message : 'An unexpected error occurred';
    if (status >= 500) {
      log.error(`${req.method} ${req.path} failed`, {
        message,
        ...(err instanceof AppError ? err.details() : {}),
      });
    } else {
      log.warn(`${req.method} ${req.path} rejected`, { status, message });
    }

    res.status(status).json({
      error: errorLabel(err, status),
      message,
      ...(err instanceof AppError && err.details() ? { details: err.details() } : {}),
    });
  });

  return app;
}

/**
 * Start the server
 */
export function startServer(config: ServiceConfig = loadConfig()): Server {
  const app = createServer({ config });

  const server = app.listen(config.port, () => {
    log.info(`Server running on port ${config.port}`, { wireviz: config.wirevizCommand });
  });

  const shutdown = (signal: string): void => {
    log.info(`${signal} received, shutting down`);
    server.close(() => {
      log.info('HTTP server closed');
      process.exit(0);
    });
    // Renders in flight get the engine timeout to finish
    setTimeout(() => {
      log.error('Forced exit after timeout');
      process.exit(1);
    }, config.renderTimeoutMs).unref();
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  return server;
}

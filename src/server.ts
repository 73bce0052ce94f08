import express, { Application, NextFunction, Request, Response } from 'express';
import morgan from 'morgan';
import type { Server } from 'node:http';
import { statusCodeOf } from './errors.js';
import { createApiRoutes, SiteData } from './routes/api.js';

/**
 * Preview server options
 */
export interface ServerOptions {
  /** Directory of generated pages to serve statically */
  outDir: string;
  /** Log each request (default: true) */
  logRequests?: boolean;
}

/**
 * Create and configure the Express application
 */
export function createApp(data: SiteData, options: ServerOptions): Application {
  const app = express();

  // Middleware
  if (options.logRequests ?? true) {
    app.use(morgan('dev'));
  }
  app.use(express.json());

  // API routes
  app.use('/api', createApiRoutes(data));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      pages: data.report.pages.length
    });
  });

  // Generated site
  app.use(express.static(options.outDir));

  app.use((req, res) => {
    res.status(404).json({ error: `Not found: ${req.path}` });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusCodeOf(err);
    const message = err instanceof Error ? err.message : String(err);
    if (status >= 500) {
      console.error('Request failed:', err);
    }
    res.status(status).json({ error: message });
  });

  return app;
}

/**
 * Start listening and stop cleanly on SIGINT/SIGTERM
 */
export function startServer(app: Application, port: number): Server {
  const server = app.listen(port, () => {
    console.log(`Preview server listening on http://localhost:${port}`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  return server;
}

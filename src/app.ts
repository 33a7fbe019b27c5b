import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { createDatabaseRouter } from './api/routes/database';
import { CommandExecutor } from './core/executor/CommandExecutor';

export interface AppOptions {
  logRequests?: boolean;
}

export function createApp(executor: CommandExecutor, options: AppOptions = {}): Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  if (options.logRequests ?? true) {
    app.use((req, res, next) => {
      console.log(`${new Date().toISOString()} ${req.method} ${req.url}`);
      next();
    });
  }

  app.use('/api/db', createDatabaseRouter(executor));

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime()
    });
  });

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      success: false,
      message: `Route ${req.originalUrl} not found`
    });
  });

  // Error handling middleware; body-parser errors carry their own status
  app.use((err: Error & { status?: number }, req: Request, res: Response, _next: NextFunction) => {
    const status = err.status ?? 500;
    if (status >= 500) {
      console.error('❌ Server error:', err);
    }
    res.status(status).json({
      success: false,
      message: status >= 500 ? 'Internal server error' : err.message
    });
  });

  return app;
}

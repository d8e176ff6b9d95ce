// src/app.ts
import express, { Express, Request, Response, NextFunction } from 'express';
import { createRoutes } from './routes/index';
import type { Database } from './types/database';

export interface AppOptions {
  // Log method, path and body of every write request
  logRequests?: boolean;
  // Include error messages and stacks in 500 responses
  exposeErrorDetails?: boolean;
}

export const createApp = (database: Database, options: AppOptions = {}): Express => {
  const app = express();

  // Content-Type middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const contentType = req.header('Content-Type');
    if (contentType?.includes('application/json')) {
      req.headers['content-type'] = 'application/json';
    }
    next();
  });

  app.use(express.json({
    limit: '1mb',
    strict: true
  }));

  // JSON error handling middleware
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (err instanceof SyntaxError && 'body' in err) {
      console.error('JSON Parse Error:', err.message);
      return res.status(400).json({
        message: 'JSON inválido'
      });
    }
    next(err);
  });

  // CORS headers
  app.use((req: Request, res: Response, next: NextFunction) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Origin, X-Requested-With, Content-Type, Accept');
    if (req.method === 'OPTIONS') {
      return res.sendStatus(200);
    }
    next();
  });

  if (options.logRequests) {
    app.use((req: Request, res: Response, next: NextFunction) => {
      if (['POST', 'PUT'].includes(req.method)) {
        console.log('Request debug info:', {
          method: req.method,
          path: req.path,
          contentType: req.header('Content-Type'),
          body: req.body
        });
      }
      next();
    });
  }

  app.use('/', createRoutes(database, { exposeErrorDetails: options.exposeErrorDetails }));

  return app;
};

// src/routes/index.ts

import { Request, Response, NextFunction, Router } from 'express';
import { createPersonRoutes } from './person.routes';
import { PersonStore } from '../services/PersonStore';
import type { Database } from '../types/database';

export interface RouteOptions {
  exposeErrorDetails?: boolean;
}

export const createRoutes = (database: Database, { exposeErrorDetails = false }: RouteOptions = {}): Router => {
  const router = Router();

  router.use('/persons', createPersonRoutes(new PersonStore(database)));

  router.use((req: Request, res: Response) => {
    res.status(404).json({
      message: 'Ruta no encontrada'
    });
  });

  // Global error handler - this should be the last middleware
  router.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    // If headers have already been sent, let Express handle it
    if (res.headersSent) {
      return next(err);
    }

    console.error('API Error:', {
      method: req.method,
      path: req.path,
      error: err,
      stack: err instanceof Error ? err.stack : undefined
    });

    return res.status(500).json({
      message: exposeErrorDetails && err instanceof Error ? err.message : 'Error interno del servidor',
      ...(exposeErrorDetails && err instanceof Error && {
        stack: err.stack
      })
    });
  });

  return router;
};

import { Router, Request, Response, NextFunction } from 'express';
import {
  PersonStore,
  PersonStoreError,
  InvalidRequestError
} from '../services/PersonStore';
import {
  ValidationError,
  validateForCreate,
  validateForUpdate,
  parseFilter,
  serialize,
  serializeMany
} from '../services/PersonValidator';

// Only non-negative integer ids reach the handlers
const ID_PARAM = '/:id(\\d+)';

export const createPersonRoutes = (store: PersonStore): Router => {
  const router = Router();

  // Create a person
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = validateForCreate(req.body);
      const person = await store.create(data);

      res.status(201).json(serialize(person));
    } catch (error) {
      next(error);
    }
  });

  // List persons, filtered by equality on any column (e.g. /persons?edad=34&nombre=Luis)
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const filter = parseFilter(req.query);
      const persons = await store.list(filter);

      res.json(serializeMany(persons));
    } catch (error) {
      next(error);
    }
  });

  // Get a specific person
  router.get(ID_PARAM, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const person = await store.getById(Number(req.params.id));

      res.json(serialize(person));
    } catch (error) {
      next(error);
    }
  });

  // Update only the supplied fields
  router.put(ID_PARAM, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const changes = validateForUpdate(req.body);
      const person = await store.update(Number(req.params.id), changes);

      res.json(serialize(person));
    } catch (error) {
      next(error);
    }
  });

  router.delete(ID_PARAM, async (req: Request, res: Response, next: NextFunction) => {
    try {
      await store.delete(Number(req.params.id));

      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  // Error handling middleware
  router.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (err instanceof ValidationError) {
      return res.status(err.statusCode).json(err.messages);
    }

    if (err instanceof InvalidRequestError) {
      console.error('Datastore rejected request:', {
        method: req.method,
        path: req.path,
        reason: err.reason
      });
    }

    if (err instanceof PersonStoreError) {
      return res.status(err.statusCode).json({
        message: err.message
      });
    }

    next(err);
  });

  return router;
};

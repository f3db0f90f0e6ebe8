import { Router } from 'express';
import { Engine } from '../engine';
import { applicationRoutes } from './application.routes';
import { claimRoutes } from './claim.routes';
import { quoteRoutes } from './quote.routes';

export function createRoutes(engine: Engine): Router {
  const router = Router();

  // Health check
  router.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  router.use('/quotes', quoteRoutes(engine));
  router.use('/claims', claimRoutes(engine));
  router.use('/applications', applicationRoutes(engine));

  return router;
}

import { Router } from 'express';
import { param } from 'express-validator';
import { ApplicationController } from '../controllers/application.controller';
import { authenticate } from '../middleware/auth.middleware';
import { validate } from '../middleware/validation.middleware';
import { Engine } from '../engine';

export function applicationRoutes(engine: Engine): Router {
  const router = Router();
  const controller = new ApplicationController(engine.eligibility);

  router.use(authenticate);

  router.post(
    '/:id/eligibility',
    validate([param('id').notEmpty().withMessage('Application ID is required')]),
    (req, res, next) => controller.checkEligibility(req, res, next)
  );

  return router;
}

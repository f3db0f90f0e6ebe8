import { Router } from 'express';
import { body, param } from 'express-validator';
import { QuoteController } from '../controllers/quote.controller';
import { authenticate, authorize } from '../middleware/auth.middleware';
import { validate } from '../middleware/validation.middleware';
import { Engine } from '../engine';
import { Role } from '../types/auth.types';

const generateValidation = [
  body('applicationId').isString().notEmpty().withMessage('Application ID is required'),
  body('coverageIds').optional().isArray().withMessage('Coverage IDs must be an array'),
  body('coverageIds.*').isString().withMessage('Coverage IDs must be strings'),
  body('addonIds').optional().isArray().withMessage('Add-on IDs must be an array'),
  body('addonIds.*').isString().withMessage('Add-on IDs must be strings'),
];

const idValidation = [param('id').notEmpty().withMessage('Quote ID is required')];

export function quoteRoutes(engine: Engine): Router {
  const router = Router();
  const controller = new QuoteController(engine.quotes, engine.quoteLifecycle);

  router.use(authenticate);

  router.post('/generate', authorize(Role.OFFICER), validate(generateValidation), (req, res, next) =>
    controller.generate(req, res, next)
  );
  router.get('/recommendations/:applicationId', (req, res, next) => controller.getRecommendations(req, res, next));
  router.get('/:id', validate(idValidation), (req, res, next) => controller.getById(req, res, next));
  router.post('/:id/accept', validate(idValidation), (req, res, next) => controller.accept(req, res, next));
  router.post('/:id/reject', validate(idValidation), (req, res, next) => controller.reject(req, res, next));
  router.post('/:id/send', authorize(Role.OFFICER), validate(idValidation), (req, res, next) =>
    controller.send(req, res, next)
  );

  return router;
}

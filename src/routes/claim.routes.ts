import { Router } from 'express';
import { body, param } from 'express-validator';
import { ClaimController } from '../controllers/claim.controller';
import { authenticate, authorize } from '../middleware/auth.middleware';
import { validate } from '../middleware/validation.middleware';
import { Engine } from '../engine';
import { Role } from '../types/auth.types';
import { ClaimStatus, SettlementMethod } from '../types/engine.types';

const idValidation = param('id').notEmpty().withMessage('ID is required');

const transitionValidation = [
  idValidation,
  body('status').isIn(Object.values(ClaimStatus)).withMessage('Invalid status'),
  body('reason').optional().isString().withMessage('Reason must be string'),
  body('approvedAmount').optional().isNumeric().withMessage('Approved amount must be numeric').toFloat(),
  body('settledAmount').optional().isNumeric().withMessage('Settled amount must be numeric').toFloat(),
];

const surveyorValidation = [
  idValidation,
  body('surveyorId').isString().notEmpty().withMessage('Surveyor ID is required'),
  body('surveyorEmail').optional().isEmail().withMessage('Valid surveyor email required'),
  body('assessmentDate').optional().isISO8601().withMessage('Valid assessment date required'),
];

const assessmentValidation = [
  idValidation,
  body('damageDescription').isString().notEmpty().withMessage('Damage description is required'),
  body('lossAmount').isNumeric().withMessage('Loss amount must be numeric').toFloat(),
  body('deductible').optional().isNumeric().withMessage('Deductible must be numeric').toFloat(),
  body('findings').optional().isObject().withMessage('Findings must be an object'),
];

const settlementValidation = [
  idValidation,
  body('method').optional().isIn(Object.values(SettlementMethod)).withMessage('Invalid settlement method'),
  body('bankDetails').optional().isObject().withMessage('Bank details must be an object'),
];

export function claimRoutes(engine: Engine): Router {
  const router = Router();
  const controller = new ClaimController(engine.claims);

  router.use(authenticate);

  router.post('/assessments/:id', authorize(Role.SURVEYOR), validate(assessmentValidation), (req, res, next) =>
    controller.recordAssessment(req, res, next)
  );
  router.get('/:id', validate([idValidation]), (req, res, next) => controller.getById(req, res, next));
  router.get('/:id/history', validate([idValidation]), (req, res, next) => controller.getHistory(req, res, next));
  router.post('/:id/transition', authorize(Role.OFFICER), validate(transitionValidation), (req, res, next) =>
    controller.transition(req, res, next)
  );
  router.post('/:id/surveyor', authorize(Role.OFFICER), validate(surveyorValidation), (req, res, next) =>
    controller.assignSurveyor(req, res, next)
  );
  router.post('/:id/investigation', authorize(Role.SURVEYOR), validate([idValidation]), (req, res, next) =>
    controller.startInvestigation(req, res, next)
  );
  router.post('/:id/settlements', authorize(Role.OFFICER), validate(settlementValidation), (req, res, next) =>
    controller.createSettlement(req, res, next)
  );
  router.get('/:id/sla', validate([idValidation]), (req, res, next) => controller.getSlaStatus(req, res, next));
  router.get('/:id/authority', validate([idValidation]), (req, res, next) => controller.getAuthority(req, res, next));

  return router;
}

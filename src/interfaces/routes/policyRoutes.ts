import { Router } from 'express';
import { container } from '../../container';
import { PolicyController } from '../controllers/PolicyController';
import { authenticate } from '../middleware/authMiddleware';
import { validate } from '../middleware/validationMiddleware';
import { asyncHandler } from '../middleware/errorMiddleware';
import { oracleRateLimiter } from '../middleware/rateLimitMiddleware';
import {
  createPolicySchema,
  evaluatePolicySchema,
  getHolderPoliciesSchema,
  getPolicySchema,
  updateFlightInfoSchema
} from '../validation/schemas';

export function createPolicyRoutes(): Router {
  const router = Router();
  const controller = container.get<PolicyController>('PolicyController');

  router.post('/policies',
    authenticate(),
    validate(createPolicySchema),
    asyncHandler((req, res) => controller.createPolicy(req, res))
  );

  router.get('/policies/:policyId',
    validate(getPolicySchema),
    asyncHandler((req, res) => controller.getPolicy(req, res))
  );

  router.get('/policies/:policyId/events',
    validate(getPolicySchema),
    asyncHandler((req, res) => controller.getPolicyEvents(req, res))
  );

  router.get('/holders/:holder/policies',
    validate(getHolderPoliciesSchema),
    asyncHandler((req, res) => controller.getHolderPolicies(req, res))
  );

  router.put('/policies/:policyId/flight-info',
    authenticate(),
    oracleRateLimiter,
    validate(updateFlightInfoSchema),
    asyncHandler((req, res) => controller.updateFlightInfo(req, res))
  );

  router.post('/policies/:policyId/evaluate',
    authenticate(),
    oracleRateLimiter,
    validate(evaluatePolicySchema),
    asyncHandler((req, res) => controller.evaluate(req, res))
  );

  return router;
}

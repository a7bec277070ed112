import { Router } from 'express';
import { container } from '../../container';
import { TreasuryController } from '../controllers/TreasuryController';
import { authenticate } from '../middleware/authMiddleware';
import { validate } from '../middleware/validationMiddleware';
import { asyncHandler } from '../middleware/errorMiddleware';
import { treasuryRateLimiter } from '../middleware/rateLimitMiddleware';
import { withdrawSchema } from '../validation/schemas';

export function createTreasuryRoutes(): Router {
  const router = Router();
  const controller = container.get<TreasuryController>('TreasuryController');

  router.post('/withdraw',
    authenticate(),
    treasuryRateLimiter,
    validate(withdrawSchema),
    asyncHandler((req, res) => controller.withdraw(req, res))
  );

  return router;
}

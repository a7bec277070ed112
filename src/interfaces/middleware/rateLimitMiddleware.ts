import rateLimit from 'express-rate-limit';
import { Request, Response } from 'express';
import { logger } from '../../infrastructure/logging/Logger';

export const createRateLimiter = (
  windowMs: number = 15 * 60 * 1000, // 15 minutes
  max: number = 100,
  message: string = 'Too many requests from this IP, please try again later'
) => {
  return rateLimit({
    windowMs,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req: Request) => {
      // Never rate-limit health checks or CORS preflight
      if (req.method === 'OPTIONS') return true;
      return req.path === '/health';
    },
    keyGenerator: (req: Request) => req.ip ?? 'unknown',
    handler: (req: Request, res: Response) => {
      logger.warn('Rate limit exceeded', {
        ip: req.ip,
        path: req.path,
        method: req.method
      });

      res.status(429).json({
        success: false,
        error: message,
        code: 'RATE_LIMIT_EXCEEDED'
      });
    }
  });
};

const isDevelopment = process.env.NODE_ENV === 'development';

export const apiRateLimiter = createRateLimiter(
  15 * 60 * 1000,
  isDevelopment ? 1000 : 300
);

// Oracle feeds and evaluation triggers are called by automation, so the window is short
export const oracleRateLimiter = createRateLimiter(
  60 * 1000,
  isDevelopment ? 600 : 120
);

export const treasuryRateLimiter = createRateLimiter(
  15 * 60 * 1000,
  isDevelopment ? 100 : 5
);

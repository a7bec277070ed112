import express from 'express';
import helmet from 'helmet';
import cors, { CorsOptions } from 'cors';
import dotenv from 'dotenv';
import { createPolicyRoutes } from './interfaces/routes/policyRoutes';
import { createTreasuryRoutes } from './interfaces/routes/treasuryRoutes';
import { errorHandler, notFoundHandler } from './interfaces/middleware/errorMiddleware';
import { apiRateLimiter } from './interfaces/middleware/rateLimitMiddleware';
import { logger } from './infrastructure/logging/Logger';

dotenv.config();

const DEFAULT_DEV_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:5173',
  'http://127.0.0.1:5173'
];

export function parseAllowedOrigins(raw: string | undefined): string[] {
  const origins = (raw || '')
    .split(',')
    .map(o => o.trim().replace(/\/$/, ''))
    .filter(o => o.length > 0);
  return origins.length > 0 ? origins : DEFAULT_DEV_ORIGINS;
}

export function createApp() {
  const app = express();

  // TRUST_PROXY can be: number (hops), 'true'/'false', or subnet list
  const trustProxyEnv = process.env.TRUST_PROXY;
  if (typeof trustProxyEnv !== 'undefined') {
    const lower = trustProxyEnv.toLowerCase();
    if (lower === 'true' || lower === 'false') {
      app.set('trust proxy', lower === 'true');
    } else if (!isNaN(Number(trustProxyEnv))) {
      app.set('trust proxy', Number(trustProxyEnv));
    } else {
      app.set('trust proxy', trustProxyEnv);
    }
    logger.info('Express trust proxy configured', { value: trustProxyEnv });
  }

  // Security middleware
  app.use(helmet());

  const allowedOrigins = parseAllowedOrigins(process.env.ALLOWED_ORIGINS);
  const corsOptions: CorsOptions = {
    origin: (origin, callback) => {
      // Allow same-origin/non-browser requests
      if (!origin) return callback(null, true);

      if (allowedOrigins.includes(origin.replace(/\/$/, ''))) {
        return callback(null, true);
      }

      logger.warn('CORS blocked origin', { origin });
      callback(new Error(`CORS: Origin not allowed: ${origin}`));
    },
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    exposedHeaders: ['Content-Length', 'X-Request-ID'],
    maxAge: 86400
  };

  app.use(cors(corsOptions));

  // Body parser middleware
  app.use(express.json({ limit: '100kb' }));

  // Global rate limiting
  app.use(apiRateLimiter);

  // Request logging
  app.use((req, _res, next) => {
    logger.info('Incoming request', {
      method: req.method,
      path: req.path,
      ip: req.ip,
      userAgent: req.headers['user-agent']
    });
    next();
  });

  app.head('/health', (_req, res) => res.sendStatus(200));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: process.env.NODE_ENV || 'development'
    });
  });

  // API routes
  app.use('/api', createPolicyRoutes());
  app.use('/api/treasury', createTreasuryRoutes());

  // 404 handler
  app.use(notFoundHandler);

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}

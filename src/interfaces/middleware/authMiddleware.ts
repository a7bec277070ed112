import { Request, Response, NextFunction } from 'express';
import { container } from '../../container';
import { JwtService } from '../../infrastructure/auth/JwtService';
import { AppError } from '../../domain/errors/AppError';
import './requestCaller';

/**
 * Attaches the verified `Caller` to the request. Which capabilities an
 * operation needs is checked by the use case, not here.
 */
export function authenticate() {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      const authHeader = req.headers.authorization;

      if (!authHeader || !authHeader.startsWith('Bearer ')) {
        throw AppError.unauthorized('No token provided');
      }

      const token = authHeader.substring(7);
      const jwtService = container.get<JwtService>('JwtService');
      req.caller = jwtService.verifyAccessToken(token);
      next();
    } catch (error) {
      if (error instanceof AppError) {
        res.status(error.statusCode).json({
          success: false,
          error: error.message,
          code: error.code
        });
      } else {
        res.status(401).json({
          success: false,
          error: 'Authentication failed',
          code: 'UNAUTHORIZED'
        });
      }
    }
  };
}

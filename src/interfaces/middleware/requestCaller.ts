import { Request } from 'express';
import { Caller } from '../../domain/entities/Caller';
import { AppError } from '../../domain/errors/AppError';

declare global {
  namespace Express {
    interface Request {
      caller?: Caller;
    }
  }
}

export function requireCaller(req: Request): Caller {
  if (!req.caller) {
    throw AppError.unauthorized('Not authenticated');
  }
  return req.caller;
}

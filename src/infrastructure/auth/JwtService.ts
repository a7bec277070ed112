import jwt from 'jsonwebtoken';
import { injectable } from 'inversify';
import { AppError } from '../../domain/errors/AppError';
import { Caller, Capability, isCapability } from '../../domain/entities/Caller';
import { logger } from '../logging/Logger';

export interface AccessTokenClaims {
  sub: string;
  capabilities: Capability[];
}

/**
 * Verifies bearer tokens issued by the identity provider and turns them into
 * a `Caller`. Token issuance is kept for operator tooling and tests.
 */
@injectable()
export class JwtService {
  private readonly accessTokenSecret: string;
  private readonly accessTokenExpirySeconds: number;

  constructor() {
    this.accessTokenSecret = process.env.JWT_ACCESS_SECRET || '';
    this.accessTokenExpirySeconds = parseInt(process.env.JWT_ACCESS_EXPIRY_SECONDS || '900', 10);

    if (!this.accessTokenSecret) {
      throw new Error('JWT secret must be configured');
    }
  }

  generateAccessToken(subject: string, capabilities: Capability[] = []): string {
    const claims: AccessTokenClaims = { sub: subject, capabilities };
    return jwt.sign(claims, this.accessTokenSecret, {
      expiresIn: this.accessTokenExpirySeconds
    });
  }

  verifyAccessToken(token: string): Caller {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.accessTokenSecret);
    } catch (error) {
      logger.warn('Invalid access token', { error: error instanceof Error ? error.message : 'Unknown error' });
      throw AppError.unauthorized('Invalid access token');
    }

    if (typeof decoded === 'string' || typeof decoded.sub !== 'string' || decoded.sub.length === 0) {
      throw AppError.unauthorized('Access token has no subject');
    }

    const rawCapabilities: unknown = decoded.capabilities;
    const capabilities = Array.isArray(rawCapabilities)
      ? rawCapabilities.filter(isCapability)
      : [];

    return new Caller(decoded.sub, capabilities);
  }
}

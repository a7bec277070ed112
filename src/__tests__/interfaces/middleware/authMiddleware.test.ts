import { Request, Response } from 'express';
import { authenticate } from '../../../interfaces/middleware/authMiddleware';
import { JwtService } from '../../../infrastructure/auth/JwtService';
import { Capability } from '../../../domain/entities/Caller';

const mockResponse = () => {
  const json = jest.fn();
  const status = jest.fn();
  const res = { status, json } as unknown as Response;
  status.mockReturnValue(res);
  return { res, status, json };
};

describe('authenticate', () => {
  const originalSecret = process.env.JWT_ACCESS_SECRET;

  beforeAll(() => {
    process.env.JWT_ACCESS_SECRET = 'test-secret';
  });

  afterAll(() => {
    if (originalSecret === undefined) {
      delete process.env.JWT_ACCESS_SECRET;
    } else {
      process.env.JWT_ACCESS_SECRET = originalSecret;
    }
  });

  it('should attach the caller for a valid bearer token', () => {
    const token = new JwtService().generateAccessToken('oracle-1', [Capability.ORACLE]);
    const req = { headers: { authorization: `Bearer ${token}` } } as unknown as Request;
    const next = jest.fn();

    authenticate()(req, mockResponse().res, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(req.caller?.id).toBe('oracle-1');
    expect(req.caller?.has(Capability.ORACLE)).toBe(true);
  });

  it('should answer 401 without a token', () => {
    const { res, status, json } = mockResponse();
    const next = jest.fn();

    authenticate()({ headers: {} } as unknown as Request, res, next);

    expect(next).not.toHaveBeenCalled();
    expect(status).toHaveBeenCalledWith(401);
    expect(json).toHaveBeenCalledWith({ success: false, error: 'No token provided', code: 'UNAUTHORIZED' });
  });

  it('should answer 401 for a bad token', () => {
    const { res, status, json } = mockResponse();

    authenticate()({ headers: { authorization: 'Bearer not-a-token' } } as unknown as Request, res, jest.fn());

    expect(status).toHaveBeenCalledWith(401);
    expect(json).toHaveBeenCalledWith({ success: false, error: 'Invalid access token', code: 'UNAUTHORIZED' });
  });
});

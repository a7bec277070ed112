export enum ErrorCode {
  UNAUTHORIZED = 'UNAUTHORIZED',
  NOT_FOUND = 'NOT_FOUND',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  INVALID_SCHEDULE = 'INVALID_SCHEDULE',
  INCORRECT_PREMIUM = 'INCORRECT_PREMIUM',
  INVALID_HOLDER = 'INVALID_HOLDER',
  POLICY_NOT_FOUND = 'POLICY_NOT_FOUND',
  POLICY_NOT_ACTIVE = 'POLICY_NOT_ACTIVE',
  SETTLEMENT_FAILURE = 'SETTLEMENT_FAILURE'
}

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly message: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  static unauthorized(message = 'Unauthorized'): AppError {
    return new AppError(ErrorCode.UNAUTHORIZED, message, 401);
  }

  /**
   * Caller is authenticated but lacks a capability the operation requires.
   * Same error kind as a missing token, different status.
   */
  static missingCapability(operation: string): AppError {
    return new AppError(ErrorCode.UNAUTHORIZED, `Caller is not allowed to perform ${operation}`, 403);
  }

  static notFound(message = 'Not found'): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static internalError(message = 'Internal server error'): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500);
  }

  static rateLimitExceeded(message = 'Rate limit exceeded'): AppError {
    return new AppError(ErrorCode.RATE_LIMIT_EXCEEDED, message, 429);
  }

  static invalidSchedule(scheduledDeparture: number, scheduledArrival: number): AppError {
    return new AppError(
      ErrorCode.INVALID_SCHEDULE,
      'Scheduled arrival must be after scheduled departure',
      400,
      { scheduledDeparture, scheduledArrival }
    );
  }

  static incorrectPremium(expected: bigint, received: bigint): AppError {
    return new AppError(
      ErrorCode.INCORRECT_PREMIUM,
      'Paid amount does not match the premium',
      400,
      { expected: expected.toString(), received: received.toString() }
    );
  }

  static invalidHolder(holder: string): AppError {
    return new AppError(ErrorCode.INVALID_HOLDER, 'Holder cannot receive payouts through the configured settlement', 400, { holder });
  }

  static policyNotFound(policyId: number): AppError {
    return new AppError(ErrorCode.POLICY_NOT_FOUND, `Policy ${policyId} not found`, 404);
  }

  static policyNotActive(policyId: number): AppError {
    return new AppError(ErrorCode.POLICY_NOT_ACTIVE, `Policy ${policyId} is no longer active`, 409);
  }

  static settlementFailure(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.SETTLEMENT_FAILURE, message, 502, details);
  }
}

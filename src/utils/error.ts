export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum LEASE_ERROR {
  CAPACITY_EXCEEDED = "CAPACITY_EXCEEDED",
  INVALID_CAPACITY = "INVALID_CAPACITY",
  INVALID_OPTION = "INVALID_OPTION",
  KEY_INDEX_OVERFLOW = "KEY_INDEX_OVERFLOW",
  KEY_GENERATION_OVERFLOW = "KEY_GENERATION_OVERFLOW",
}

export class LeaseError extends AppError {
  constructor(
    public readonly category: LEASE_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_lease_error(error: unknown): error is LeaseError {
  return error instanceof LeaseError;
}

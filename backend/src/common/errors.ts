/**
 * Application errors.
 *
 * Anything thrown as an AppError is rendered by the global error
 * handler as { ok: false, error: code, message } with its status.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 400
  ) {
    super(message);
    this.name = new.target.name;
  }
}

// ═══════════════════════════════════════════════════════════════
// ENGINE INPUT ERRORS
// ═══════════════════════════════════════════════════════════════

export class InsufficientDataError extends AppError {
  constructor(points: number, required = 2) {
    super(`Price series needs at least ${required} points, got ${points}`, 'INSUFFICIENT_DATA');
  }
}

export class InvalidPriceError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_PRICE');
  }
}

export class InvalidPortfolioValueError extends AppError {
  constructor(value: number) {
    super(`Portfolio value must be a non-negative number, got ${value}`, 'INVALID_PORTFOLIO_VALUE');
  }
}

export class InvalidWeightsError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_WEIGHTS');
  }
}

// ═══════════════════════════════════════════════════════════════
// API ERRORS
// ═══════════════════════════════════════════════════════════════

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
  }
}

import type { SessionState } from '../types';

export class PgSessionError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'PgSessionError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised for bad caller input (empty rows, arity mismatches, missing key
 * fields, malformed identifiers) before any statement reaches the database.
 */
export class ValidationError extends PgSessionError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

/**
 * Raised when a session is used outside its open scope.
 */
export class SessionStateError extends PgSessionError {
  constructor(message: string, public state?: SessionState) {
    super(message, 'SESSION_STATE_ERROR');
    this.name = 'SessionStateError';
  }
}

export class ConfigurationError extends PgSessionError {
  constructor(message: string, public setting?: string, cause?: Error) {
    super(message, 'CONFIGURATION_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

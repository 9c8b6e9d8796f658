import { Response } from 'express';
import { GatewayFailureKind } from '../types';

/**
 * Base class for errors that map onto an HTTP status.
 * Anything else reaching a handler is reported as a 500.
 */
export class AppError extends Error {
  constructor(message: string, readonly status: number) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidCredentials extends AppError {
  constructor() {
    super('Invalid username or password', 401);
  }
}

export class UnknownUser extends AppError {
  constructor(username: string) {
    super(`Unknown user "${username}"`, 404);
  }
}

export class InvalidSession extends AppError {
  constructor(reason = 'Session is missing or has expired') {
    super(reason, 401);
  }
}

export class Forbidden extends AppError {
  constructor(message = 'Admin access required') {
    super(message, 403);
  }
}

export class NotFound extends AppError {
  constructor(what: string) {
    super(`${what} not found`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ExtractionFailed extends AppError {
  constructor(fileName: string, cause: string) {
    super(`Failed to extract text from ${fileName}: ${cause}`, 422);
  }
}

export class GatewayFailure extends Error {
  constructor(readonly kind: GatewayFailureKind, message: string) {
    super(message);
    this.name = 'GatewayFailure';
  }
}

export const RETRY_MESSAGE = 'The assistant is temporarily unavailable. Please try again.';

// The query travels with the error so the client can re-display it
export class QueryFailed extends AppError {
  constructor(readonly query: string, readonly kind: GatewayFailureKind) {
    super(RETRY_MESSAGE, kind === 'RateLimited' ? 503 : 502);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof QueryFailed) {
    console.warn(`[${context}] Query failed (${error.kind})`);
    res.status(error.status).json({ error: error.message, query: error.query, kind: error.kind });
    return;
  }
  if (error instanceof InvalidSession) {
    res.status(error.status).json({ error: error.message, login: '/login' });
    return;
  }
  if (error instanceof AppError) {
    res.status(error.status).json({ error: error.message });
    return;
  }

  console.error(`[${context}] Unexpected error:`, error);
  res.status(500).json({
    error: errorMessage(error) || 'Internal server error',
    details: process.env.NODE_ENV === 'development' && error instanceof Error ? error.stack : undefined
  });
}

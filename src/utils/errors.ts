export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public isOperational: boolean = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ServiceError extends Error {
  constructor(
    public service: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(`${service}.${operation} failed: ${originalError.message}`);
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class InvalidRangeError extends AppError {
  constructor(message: string) {
    super(400, message, true);
    Object.setPrototypeOf(this, InvalidRangeError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, message, true);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export type ParticipantErrorKind = 'timeout' | 'unreachable' | 'rejected' | 'protocol';

export class ParticipantError extends Error {
  constructor(
    public participantId: string,
    public operation: string,
    public kind: ParticipantErrorKind,
    public originalError: Error,
    public statusCode?: number
  ) {
    super(`${participantId}.${operation} ${kind}: ${originalError.message}`);
    Object.setPrototypeOf(this, ParticipantError.prototype);
  }
}

export class TimeoutError extends Error {
  constructor(
    public label: string,
    public timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

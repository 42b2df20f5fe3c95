/*
  Error taxonomy shared by the services and the HTTP layer.
  Each error knows the status code and error_code it is reported with.
*/

export interface FieldIssue {
  field: string;
  message: string;
}

export class ServiceError extends Error {
  readonly statusCode: number;
  readonly errorCode: string;

  constructor(message: string, statusCode: number, errorCode: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.errorCode = errorCode;
  }
}

export class ValidationError extends ServiceError {
  readonly issues: FieldIssue[];

  constructor(issues: FieldIssue[]) {
    super(issues.map((issue) => `${issue.field}: ${issue.message}`).join('; '), 400, 'VALIDATION_ERROR');
    this.issues = issues;
  }
}

export class DuplicateEmailError extends ServiceError {
  constructor(email: string) {
    super(`Email already registered: ${email}`, 400, 'EMAIL_ALREADY_REGISTERED');
  }
}

export class UnknownUserError extends ServiceError {
  constructor(userId: string) {
    super(`User does not exist: ${userId}`, 400, 'UNKNOWN_USER');
  }
}

export type EntityKind = 'user' | 'task';

export class NotFoundError extends ServiceError {
  readonly entity: EntityKind;

  constructor(entity: EntityKind, id: string) {
    const label = entity === 'user' ? 'User' : 'Task';
    super(`${label} not found: ${id}`, 404, `${entity.toUpperCase()}_NOT_FOUND`);
    this.entity = entity;
  }
}

// Error response envelope returned by every failing endpoint
export interface ErrorResponse {
  success: false;
  message: string;
  error_code?: string;
  details?: unknown;
  timestamp: string;
}

export function createErrorResponse(
  message: string,
  details?: unknown,
  errorCode?: string
): ErrorResponse {
  const response: ErrorResponse = {
    success: false,
    message,
    timestamp: new Date().toISOString()
  };

  if (errorCode) {
    response.error_code = errorCode;
  }

  if (details !== undefined && details !== null) {
    response.details = details;
  }

  return response;
}

export function describeError(error: unknown, includeStack: boolean): Record<string, string | undefined> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: includeStack ? error.stack : undefined
    };
  }
  return { name: 'Error', message: String(error) };
}

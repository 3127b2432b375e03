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
  constructor(message: string, public issues: string[] = []) {
    super(400, message, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, message, true);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export type WorkflowErrorKind =
  | 'InvalidActionType'
  | 'InvalidInsuranceType'
  | 'NoActionSet'
  | 'InsuranceTypeMismatch'
  | 'NothingCollected'
  | 'AlreadySubmitted';

export class WorkflowStateError extends AppError {
  constructor(public kind: WorkflowErrorKind, message: string) {
    super(409, message, true);
    Object.setPrototypeOf(this, WorkflowStateError.prototype);
  }
}

export class AuthenticationFailedError extends ServiceError {
  constructor(service: string, originalError: Error) {
    super(service, 'login', originalError, true);
    Object.setPrototypeOf(this, AuthenticationFailedError.prototype);
  }
}

export class ExternalCallFailedError extends ServiceError {
  constructor(
    service: string,
    operation: string,
    originalError: Error,
    public status?: number
  ) {
    super(service, operation, originalError, false);
    Object.setPrototypeOf(this, ExternalCallFailedError.prototype);
  }
}

export class UnknownToolError extends AppError {
  constructor(public toolName: string) {
    super(400, `Unknown tool: ${toolName}`, true);
    Object.setPrototypeOf(this, UnknownToolError.prototype);
  }
}

export class ToolLoopExceededError extends AppError {
  constructor(public maxRounds: number) {
    super(503, `Model kept requesting tools after ${maxRounds} rounds`, true);
    Object.setPrototypeOf(this, ToolLoopExceededError.prototype);
  }
}

export class TurnTimeoutError extends AppError {
  constructor(public timeoutMs: number) {
    super(503, `Turn did not complete within ${timeoutMs}ms`, true);
    Object.setPrototypeOf(this, TurnTimeoutError.prototype);
  }
}

export class SMSError extends AppError {
  constructor(
    public provider: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(502, `SMS provider error: ${provider}.${operation}`, true);
    Object.setPrototypeOf(this, SMSError.prototype);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function errorMessage(value: unknown): string {
  return toError(value).message;
}

/** Reads an HTTP-ish status code off SDK errors (OpenAI, Anthropic, Twilio). */
export function errorStatus(value: unknown): number | undefined {
  if (typeof value === 'object' && value !== null && 'status' in value) {
    return typeof value.status === 'number' ? value.status : undefined;
  }
  return undefined;
}

export type ErrorCode =
  | 'configuration_error'
  | 'remote_unavailable'
  | 'rate_limited'
  | 'scope_not_found'
  | 'invalid_parameters'
  | 'provider_unavailable'
  | 'invalid_request'
  | 'turn_in_progress'
  | 'cancelled';

export class LogscopeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Fatal; raised while loading configuration, before any turn runs. */
export class ConfigurationError extends LogscopeError {
  constructor(message: string) {
    super('configuration_error', message);
  }
}

export class RemoteUnavailableError extends LogscopeError {
  constructor(message: string, options?: { cause?: unknown; code?: 'remote_unavailable' | 'rate_limited' }) {
    super(options?.code ?? 'remote_unavailable', message, options);
  }
}

export class RateLimitedError extends RemoteUnavailableError {
  readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number) {
    super(message, { code: 'rate_limited' });
    this.retryAfterMs = retryAfterMs;
  }
}

export class ScopeNotFoundError extends LogscopeError {
  readonly scope: string;

  constructor(scope: string, message = `Log group not found: ${scope}`) {
    super('scope_not_found', message);
    this.scope = scope;
  }
}

export class InvalidParametersError extends LogscopeError {
  constructor(message: string) {
    super('invalid_parameters', message);
  }
}

export class ProviderUnavailableError extends LogscopeError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('provider_unavailable', message, options);
    this.status = options?.status;
  }
}

export class InvalidModelRequestError extends LogscopeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('invalid_request', message, options);
  }
}

export class TurnInProgressError extends LogscopeError {
  constructor(conversationId: string) {
    super('turn_in_progress', `A turn is already running for conversation ${conversationId}`);
  }
}

export class CancelledError extends LogscopeError {
  constructor(message = 'Turn cancelled') {
    super('cancelled', message);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof CancelledError || (error instanceof Error && error.name === 'AbortError');
}

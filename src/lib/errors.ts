/**
 * Error taxonomy shared by the OAuth flow, the credential store and the tool dispatcher.
 *
 * Every error carries a machine `code` and the HTTP `status` the Express error handler answers
 * with. Domain errors are the only kind a tool call reports as data; everything else aborts the
 * request.
 */

type ErrorOptions = { cause?: unknown };

export abstract class AppError extends Error {
  abstract readonly status: number;
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing, malformed, invalid or expired bearer credential. */
export class AuthenticationError extends AppError {
  readonly status = 401;

  constructor(message: string, code = 'unauthorized') {
    super(code, message);
  }
}

/** Bad CSRF state, failed code exchange, failed identity verification or missing claims. */
export class AuthorizationFlowError extends AppError {
  readonly status: number;

  constructor(code: string, message: string, status = 400, options?: ErrorOptions) {
    super(code, message, options);
    this.status = status;
  }
}

export class ClientRegistrationError extends AppError {
  readonly status: number;

  constructor(code: string, message: string, status = 400) {
    super(code, message);
    this.status = status;
  }
}

const domainStatus: Record<string, number> = {
  NOT_FOUND: 404,
  USER_HAS_TASKS: 409,
  EMAIL_IN_USE: 409,
};

/** Business-rule failure. Rendered as `{ error, code }` inside a tool envelope. */
export class DomainError extends AppError {
  readonly status: number;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(code, message, options);
    this.status = domainStatus[code] ?? 400;
  }
}

export class NotFoundError extends DomainError {
  constructor(message = 'Task not found') {
    super('NOT_FOUND', message);
  }
}

export class UnknownToolError extends AppError {
  readonly status = 404;

  constructor(name: string) {
    super('unknown_tool', `Tool '${name}' not found`);
  }
}

/** Malformed request body outside the OAuth and tool-parameter paths. */
export class InvalidRequestError extends AppError {
  readonly status = 400;

  constructor(message: string) {
    super('invalid_request', message);
  }
}

/** Store unavailable, cipher misconfigured, upstream outage. Never exposes detail to callers. */
export class InfrastructureError extends AppError {
  readonly status: number;
  readonly retryable: boolean;

  constructor(code: string, message: string, options?: ErrorOptions & { retryable?: boolean }) {
    super(code, message, options);
    this.retryable = options?.retryable ?? false;
    this.status = this.retryable ? 503 : 500;
  }
}

export class ConfigurationError extends InfrastructureError {
  constructor(message: string) {
    super('configuration_error', message);
  }
}

export class DecryptionError extends InfrastructureError {
  constructor(message = 'Unable to decrypt stored token', options?: ErrorOptions) {
    super('decryption_error', message, options);
  }
}

export const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

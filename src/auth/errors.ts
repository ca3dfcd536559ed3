/**
 * Login error taxonomy.
 *
 * Every failure of a browser login attempt is terminal for that attempt; none
 * of these are retried.
 */

export type LoginErrorKind =
  | 'NoPortAvailable'
  | 'ListenerStartFailed'
  | 'HandoffMissing'
  | 'NoCodeReceived'
  | 'TokenExchangeFailed'
  | 'AlreadyAuthenticated'
  | 'NonInteractive'
  | 'LoginTimedOut'
  | 'LoginCancelled';

export interface LoginErrorOptions {
  /** Remediation shown under the error line */
  hint?: string;
  /** Extra diagnostic output (e.g. listener stderr) */
  details?: string;
  /** HTTP status, for TokenExchangeFailed */
  statusCode?: number;
  /** Raw response body, for TokenExchangeFailed */
  body?: string;
  cause?: unknown;
}

export class LoginError extends Error {
  public readonly kind: LoginErrorKind;
  public readonly hint?: string;
  public readonly details?: string;
  public readonly statusCode?: number;
  public readonly body?: string;

  constructor(kind: LoginErrorKind, message: string, options: LoginErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'LoginError';
    this.kind = kind;
    this.hint = options.hint;
    this.details = options.details;
    this.statusCode = options.statusCode;
    this.body = options.body;
    Object.setPrototypeOf(this, LoginError.prototype);
  }
}

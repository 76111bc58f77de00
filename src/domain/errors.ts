export type DomainErrorCode =
  | 'invalid_input'
  | 'not_found'
  | 'duplicate_name'
  | 'optimization_aborted'
  | 'optimization_timeout';

/**
 * Error raised by the domain layer. `message` is always the code so the HTTP
 * error handler can switch on it; `detail` carries the readable reason.
 */
export class DomainError extends Error {
  readonly code: DomainErrorCode;
  readonly detail?: string;

  constructor(code: DomainErrorCode, detail?: string) {
    super(code);
    this.name = 'DomainError';
    this.code = code;
    this.detail = detail;
  }
}

export function isDomainError(err: unknown, code?: DomainErrorCode): err is DomainError {
  return err instanceof DomainError && (code === undefined || err.code === code);
}

/**
 * certadm error types
 *
 * Every error raised by the administrative interface carries a `kind`:
 * `fatal` errors always reach the caller, while `recoverable` errors are
 * reported on the diagnostic channel at the dispatcher boundary.
 */

export type ErrorKind = 'fatal' | 'recoverable';

/**
 * Base class for all certadm errors
 */
export abstract class CertAdminError extends Error {
  abstract readonly code: string;
  abstract readonly kind: ErrorKind;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;

    // Support proper stack traces
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Invalid verb, invalid target selection or a missing target.
 */
export class InvalidArgumentError extends CertAdminError {
  readonly code = 'INVALID_ARGUMENT';
  readonly kind = 'fatal';

  static invalidMethod(method: unknown): InvalidArgumentError {
    return new InvalidArgumentError(`Invalid method ${String(method)} to apply`, { method });
  }

  static invalidSubjects(value: unknown): InvalidArgumentError {
    return new InvalidArgumentError(`Subjects must be an array or 'all'; not ${String(value)}`, {
      value,
    });
  }

  static missingSubjects(method: string): InvalidArgumentError {
    return new InvalidArgumentError(`You must provide hosts or 'all' when using ${method}`, {
      method,
    });
  }
}

/**
 * A request that makes no sense for the verb it was given to
 */
export class InterfaceError extends CertAdminError {
  readonly code = 'INTERFACE_ERROR';
  readonly kind = 'fatal';

  static generateAll(): InterfaceError {
    return new InterfaceError('It makes no sense to generate all hosts; you must specify a list', {
      method: 'generate',
    });
  }

  static nothingToSign(): InterfaceError {
    return new InterfaceError('No waiting certificate requests to sign', { method: 'sign' });
  }

  static signedSelection(method: string): InterfaceError {
    return new InterfaceError("The 'signed' selection is only supported by list", { method });
  }
}

/**
 * Raised by CA implementations when a host's certificate does not verify.
 */
export class CertificateVerificationError extends CertAdminError {
  readonly code = 'CERTIFICATE_VERIFICATION';
  readonly kind = 'recoverable';

  constructor(
    message: string,
    public readonly host?: string,
  ) {
    super(message, host === undefined ? undefined : { host });
  }
}

export type CertAdminErrorType = InvalidArgumentError | InterfaceError | CertificateVerificationError;

/** True for errors that must never be swallowed by the dispatcher. */
export function isFatalError(error: unknown): error is CertAdminError {
  return error instanceof CertAdminError && error.kind === 'fatal';
}

/** Message text of anything thrown. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

import { describe, it, expect } from '@jest/globals';
import {
  CertAdminError,
  CertificateVerificationError,
  InterfaceError,
  InvalidArgumentError,
  errorMessage,
  isFatalError,
} from '../../src/index.js';

describe('certadm errors', () => {
  it('builds interface errors with their context', () => {
    const error = InterfaceError.generateAll();

    expect(error).toBeInstanceOf(CertAdminError);
    expect(error.name).toBe('InterfaceError');
    expect(error.code).toBe('INTERFACE_ERROR');
    expect(error.message).toBe('It makes no sense to generate all hosts; you must specify a list');
    expect(error.context).toEqual({ method: 'generate' });
  });

  it('builds argument errors', () => {
    const error = InvalidArgumentError.missingSubjects('revoke');

    expect(error.code).toBe('INVALID_ARGUMENT');
    expect(error.message).toBe("You must provide hosts or 'all' when using revoke");
  });

  it('keeps the host of a verification failure', () => {
    const error = new CertificateVerificationError('expired', 'web01');

    expect(error.host).toBe('web01');
    expect(error.context).toEqual({ host: 'web01' });
    expect(new CertificateVerificationError('expired').context).toBeUndefined();
  });

  it('separates fatal errors from recoverable ones', () => {
    expect(isFatalError(InterfaceError.nothingToSign())).toBe(true);
    expect(isFatalError(InvalidArgumentError.invalidMethod('x'))).toBe(true);
    expect(isFatalError(new CertificateVerificationError('expired'))).toBe(false);
    expect(isFatalError(new Error('disk full'))).toBe(false);
    expect(isFatalError('boom')).toBe(false);
  });

  it('extracts messages from anything thrown', () => {
    expect(errorMessage(new Error('disk full'))).toBe('disk full');
    expect(errorMessage('plain')).toBe('plain');
  });
});

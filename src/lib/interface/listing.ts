import { CertificateVerificationError } from '../errors/interface-errors.js';
import { debugListing } from '../utils/debug.js';
import type { CertificateAuthority } from './certificate-authority.js';
import type { Classification } from './format.js';
import { ALL, SIGNED, type SubjectSelection } from './subjects.js';

/** Hosts a listing covers for the given selection. */
export function listingUniverse(
  subjects: SubjectSelection,
  signed: readonly string[],
  pending: readonly string[],
): readonly string[] {
  switch (subjects) {
    case ALL:
      return [...signed, ...pending];
    case SIGNED:
      return signed;
    case undefined:
      return pending;
    default:
      return subjects;
  }
}

/**
 * Sort hosts into signed certificates, pending requests and certificates
 * failing verification. Hosts with a pending request are not verified.
 */
export async function classifyHosts(
  ca: CertificateAuthority,
  hosts: readonly string[],
  signed: readonly string[],
  pending: readonly string[],
): Promise<Classification> {
  const certs: Classification = { request: new Map(), signed: new Map(), invalid: new Map() };

  for (const host of [...new Set(hosts)].sort()) {
    let verifyError: string | undefined;
    if (!pending.includes(host)) {
      try {
        await ca.verify(host);
      } catch (e) {
        if (!(e instanceof CertificateVerificationError)) throw e;
        verifyError = e.message;
      }
    }

    if (verifyError !== undefined) {
      debugListing('%s failed verification: %s', host, verifyError);
      certs.invalid.set(host, { certificate: await ca.findCertificate(host), verifyError });
    } else if (signed.includes(host)) {
      certs.signed.set(host, { certificate: await ca.findCertificate(host) });
    } else {
      certs.request.set(host, { certificate: await ca.findRequest(host) });
    }
  }

  return certs;
}

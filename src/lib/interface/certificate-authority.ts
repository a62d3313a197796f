/**
 * Contract of the certificate authority the administrative interface drives.
 *
 * certadm never generates keys, signs, revokes or verifies anything itself;
 * an implementation of this interface does, and is loaded by the CLI from a
 * module named with `--ca-module`.
 */

/** Certificate or certificate request as far as the report needs it. */
export interface SubjectAltNamesSource {
  subjectAltNames?: readonly string[] | null;
}

/** Options handed verbatim to {@link CertificateAuthority.generate}. */
export interface GenerateOptions {
  allowDnsAltNames?: boolean;
  dnsAltNames?: string;
  [key: string]: unknown;
}

export interface CertificateAuthority {
  /** Hosts holding a signed certificate. */
  list(): Promise<string[]>;
  /** Hosts with an outstanding certificate request. */
  waiting(): Promise<string[]>;
  /** Rejects with `CertificateVerificationError` when the certificate does not verify. */
  verify(host: string): Promise<void>;
  generate(host: string, options: GenerateOptions): Promise<void>;
  sign(host: string, allowDnsAltNames: boolean): Promise<void>;
  revoke(host: string): Promise<void>;
  destroy(host: string): Promise<void>;
  /** Text form of the host's certificate, `undefined` when there is none. */
  print(host: string): Promise<string | undefined>;
  findCertificate(host: string): Promise<SubjectAltNamesSource | undefined>;
  findRequest(host: string): Promise<SubjectAltNamesSource | undefined>;
}

/** Shape of a module the CLI can load a CA from. */
export type CertificateAuthorityFactory = () => CertificateAuthority | Promise<CertificateAuthority>;

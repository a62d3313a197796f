/**
 * certadm library - core exports
 *
 * Administrative command interface for a certificate authority
 */

// Dispatcher
export {
  CertificateAuthorityInterface,
  type InterfaceOptions,
  type InterfaceSettings,
} from './interface/interface.js';
export { INTERFACE_METHODS, assertVerb, isVerb, type Verb, type PerHostVerb } from './interface/verbs.js';
export { ALL, SIGNED, normalizeSubjects, type SubjectSelection } from './interface/subjects.js';

// Listing and report
export { classifyHosts, listingUniverse } from './interface/listing.js';
export {
  CATEGORY_ORDER,
  formatHost,
  formatReport,
  nameWidth,
  type Classification,
  type HostCategory,
  type HostEntry,
} from './interface/format.js';

// Collaborators
export type {
  CertificateAuthority,
  CertificateAuthorityFactory,
  GenerateOptions,
  SubjectAltNamesSource,
} from './interface/certificate-authority.js';
export { plainReporter, type Reporter } from './interface/reporter.js';

// Error handling
export {
  CertAdminError,
  CertificateVerificationError,
  InterfaceError,
  InvalidArgumentError,
  errorMessage,
  isFatalError,
  type CertAdminErrorType,
  type ErrorKind,
} from './errors/interface-errors.js';

import {
  InterfaceError,
  InvalidArgumentError,
  errorMessage,
  isFatalError,
} from '../errors/interface-errors.js';
import { debugInterface } from '../utils/debug.js';
import type { CertificateAuthority, GenerateOptions } from './certificate-authority.js';
import { formatReport } from './format.js';
import { classifyHosts, listingUniverse } from './listing.js';
import { plainReporter, type Reporter } from './reporter.js';
import { ALL, SIGNED, normalizeSubjects, type SubjectSelection } from './subjects.js';
import { assertVerb, type PerHostVerb, type Verb } from './verbs.js';

/** Per-invocation settings; `to` names the hosts, the rest reaches the handlers. */
export interface InterfaceOptions extends GenerateOptions {
  to?: unknown;
}

export interface InterfaceSettings {
  /** Emit the stack of a suppressed error before its summary line. */
  trace?: boolean;
  reporter?: Reporter;
}

/**
 * One administrative action against a certificate authority.
 *
 * Build a new instance per action; {@link apply} runs it once.
 */
export class CertificateAuthorityInterface {
  readonly method: Verb;
  readonly subjects: SubjectSelection;
  readonly options: GenerateOptions;
  private readonly trace: boolean;
  private readonly reporter: Reporter;

  constructor(method: unknown, options: InterfaceOptions = {}, settings: InterfaceSettings = {}) {
    const { to, ...rest } = options;
    this.method = assertVerb(method);
    this.subjects = normalizeSubjects(to);
    this.options = rest;
    this.trace = settings.trace ?? false;
    this.reporter = settings.reporter ?? plainReporter;
  }

  /**
   * Run the verb against `ca`.
   *
   * Interface and argument errors reject. Anything else the CA throws is
   * reported as `Could not call <verb>: <message>` and the promise resolves.
   */
  async apply(ca: CertificateAuthority): Promise<void> {
    if (this.subjects === undefined && this.method !== 'list') {
      throw InvalidArgumentError.missingSubjects(this.method);
    }

    debugInterface('applying %s to %o', this.method, this.subjects);
    try {
      await this.dispatch(ca);
    } catch (e) {
      if (isFatalError(e)) throw e;
      if (this.trace && e instanceof Error && e.stack) this.reporter.err(e.stack);
      this.reporter.err(`Could not call ${this.method}: ${errorMessage(e)}`);
    }
  }

  private dispatch(ca: CertificateAuthority): Promise<void> {
    switch (this.method) {
      case 'generate':
        return this.generate(ca);
      case 'list':
        return this.list(ca);
      case 'sign':
        return this.sign(ca);
      case 'print':
        return this.print(ca);
      case 'destroy':
      case 'revoke':
      case 'verify':
        return this.applyToEach(ca, this.method);
      default: {
        const unreachable: never = this.method;
        throw InvalidArgumentError.invalidMethod(unreachable);
      }
    }
  }

  /** Explicit hosts, or every signed host for `all`. */
  private async knownHosts(ca: CertificateAuthority): Promise<readonly string[]> {
    const subjects = this.explicitSubjects();
    return subjects === ALL ? ca.list() : subjects;
  }

  private explicitSubjects(): readonly string[] | typeof ALL {
    if (this.subjects === SIGNED) throw InterfaceError.signedSelection(this.method);
    if (this.subjects === undefined) throw InvalidArgumentError.missingSubjects(this.method);
    return this.subjects;
  }

  private async applyToEach(ca: CertificateAuthority, method: PerHostVerb): Promise<void> {
    for (const host of await this.knownHosts(ca)) {
      debugInterface('%s %s', method, host);
      await ca[method](host);
    }
  }

  private async generate(ca: CertificateAuthority): Promise<void> {
    const subjects = this.explicitSubjects();
    if (subjects === ALL) throw InterfaceError.generateAll();

    for (const host of subjects) {
      await ca.generate(host, this.options);
    }
  }

  private async sign(ca: CertificateAuthority): Promise<void> {
    const subjects = this.explicitSubjects();
    const hosts = subjects === ALL ? await ca.waiting() : subjects;
    if (hosts.length === 0) throw InterfaceError.nothingToSign();

    for (const host of hosts) {
      await ca.sign(host, this.options.allowDnsAltNames === true);
    }
  }

  private async print(ca: CertificateAuthority): Promise<void> {
    for (const host of await this.knownHosts(ca)) {
      const value = await ca.print(host);
      if (value !== undefined) {
        this.reporter.out(value);
      } else {
        this.reporter.err(`Could not find certificate for ${host}`);
      }
    }
  }

  private async list(ca: CertificateAuthority): Promise<void> {
    const signed = await ca.list();
    const pending = await ca.waiting();

    const hosts = listingUniverse(this.subjects, signed, pending);
    if (hosts.length === 0) return;

    const certs = await classifyHosts(ca, hosts, signed, pending);
    this.reporter.out(formatReport(certs));
  }
}

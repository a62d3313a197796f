import {
  CertificateAuthorityInterface,
  type CertificateAuthority,
  type InterfaceOptions,
  type Reporter,
  type Verb,
} from '../../lib/index.js';
import { debugCli } from '../../lib/utils/debug.js';
import { resolveTargets, type TargetFlags } from '../utils/targets.js';

/** What a command needs from its surroundings. */
export interface CliContext {
  reporter: Reporter;
  resolveCa(modulePath: string | undefined): Promise<CertificateAuthority>;
}

/** Flags and options accepted by the verb commands. */
export interface VerbCommandOptions extends TargetFlags {
  hosts: string[];
  allowDnsAltNames?: boolean;
  dnsAltNames?: string;
  caModule?: string;
  trace?: boolean;
}

/** Run one administrative verb against the configured CA. */
export async function handleVerbCommand(
  verb: Verb,
  options: VerbCommandOptions,
  context: CliContext,
) {
  const to = resolveTargets(options.hosts, options);
  const interfaceOptions: InterfaceOptions = {
    to,
    ...(options.allowDnsAltNames ? { allowDnsAltNames: true } : {}),
    ...(options.dnsAltNames !== undefined ? { dnsAltNames: options.dnsAltNames } : {}),
  };
  const command = new CertificateAuthorityInterface(verb, interfaceOptions, {
    trace: options.trace === true,
    reporter: context.reporter,
  });

  debugCli('resolving CA for %s', verb);
  const ca = await context.resolveCa(options.caModule);
  await command.apply(ca);
}

import { Command, CommanderError, Option } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import { INTERFACE_METHODS, type Verb } from '../lib/index.js';
import { handleInteractiveMode } from './commands/interactive.js';
import { handleVerbCommand, type CliContext } from './commands/verb.js';
import { consoleReporter } from './logger.js';
import { loadCertificateAuthority } from './utils/ca-module.js';
import { handleError } from './utils/errors.js';

/** Overrides for the CLI's collaborators, mainly for tests and embedding. */
export type CliDependencies = Partial<CliContext>;

type GlobalFlags = {
  caModule?: string;
  trace?: boolean;
};

type VerbFlags = GlobalFlags & {
  all?: boolean;
  signed?: boolean;
  allowDnsAltNames?: boolean;
  dnsAltNames?: string;
};

const DESCRIPTIONS: Record<Verb, string> = {
  list: 'List pending requests, or the selected hosts with their certificate status',
  sign: 'Sign certificate requests',
  generate: 'Generate a key and a signed certificate for each host',
  print: 'Print the full text of certificates',
  verify: 'Verify certificates against the CA',
  revoke: 'Revoke certificates',
  destroy: 'Remove every file the CA holds for the hosts',
};

/** Build a Commander program instance for the certadm CLI. */
export function createCli(deps: CliDependencies = {}): Command {
  const context: CliContext = {
    reporter: deps.reporter ?? consoleReporter,
    resolveCa: deps.resolveCa ?? loadCertificateAuthority,
  };
  const program = new Command();
  const pkg: { version: string } = JSON.parse(
    readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf-8'),
  );

  program
    .name('certadm')
    .description('Administrative interface to a certificate authority')
    .version(pkg.version)
    .addOption(
      new Option('--ca-module <path>', 'module exporting createCertificateAuthority()').env(
        'CERTADM_CA_MODULE',
      ),
    )
    .addOption(
      new Option('--trace', 'print stack traces of errors reported as warnings').env(
        'CERTADM_TRACE',
      ),
    );

  // In test mode override default exit (help, errors) to throw instead of process.exit
  if (process.env.CERTADM_CLI_TEST) {
    program.exitOverride();
  }

  // Helper deciding whether to exit (skip during tests)
  function exitOnError() {
    if (process.env.CERTADM_CLI_TEST) return; // allow tests to assert thrown errors
    process.exit(1);
  }

  for (const verb of INTERFACE_METHODS) {
    const command = program
      .command(`${verb} [hosts...]`)
      .description(DESCRIPTIONS[verb])
      .option('-a, --all', verb === 'sign' ? 'every pending request' : 'every known host');
    if (verb === 'list') command.option('-s, --signed', 'only hosts holding a signed certificate');
    if (verb === 'sign') command.option('--allow-dns-alt-names', 'sign requests carrying DNS alt names');
    if (verb === 'generate') command.option('--dns-alt-names <names>', 'comma separated DNS alt names');

    command.action(async (hosts: string[] | undefined, _opts: unknown, cmd: Command) => {
      const flags = cmd.optsWithGlobals<VerbFlags>();
      try {
        await handleVerbCommand(
          verb,
          {
            hosts: hosts ?? [],
            all: flags.all,
            signed: flags.signed,
            allowDnsAltNames: flags.allowDnsAltNames,
            dnsAltNames: flags.dnsAltNames,
            caModule: flags.caModule,
            trace: flags.trace,
          },
          context,
        );
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });
  }

  program
    .command('interactive')
    .alias('i')
    .description('Interactive mode for certificate administration')
    .action(async (_opts: unknown, cmd: Command) => {
      const flags = cmd.optsWithGlobals<GlobalFlags>();
      try {
        await handleInteractiveMode({ caModule: flags.caModule, trace: flags.trace }, context);
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  return program;
}

/** For tests: parse arguments and return the program (no automatic exit). */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<Command> {
  const program = createCli(deps);
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err: unknown) {
    const code = err instanceof CommanderError ? err.code : undefined;
    // help and version output end in an exit we override during tests
    const expected = code === 'commander.helpDisplayed' || code === 'commander.version';
    if (!(process.env.CERTADM_CLI_TEST && expected)) throw err;
  }
  return program;
}

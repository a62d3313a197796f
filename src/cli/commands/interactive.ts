import { confirm, input, select } from '@inquirer/prompts';
import { ALL, INTERFACE_METHODS, SIGNED, type Verb } from '../../lib/index.js';
import { heading, render } from '../logger.js';
import { handleVerbCommand, type CliContext } from './verb.js';

/** Options carried over from the global flags. */
export interface InteractiveOptions {
  caModule?: string;
  trace?: boolean;
}

type Target = typeof ALL | typeof SIGNED | 'hosts' | 'pending';

const VERB_LABELS: Record<Verb, string> = {
  list: 'List certificates and requests',
  sign: 'Sign certificate requests',
  generate: 'Generate certificates',
  print: 'Print certificates',
  verify: 'Verify certificates',
  revoke: 'Revoke certificates',
  destroy: 'Destroy certificates',
};

const DESTRUCTIVE: readonly Verb[] = ['revoke', 'destroy'];

function targetChoices(verb: Verb): { name: string; value: Target }[] {
  const hosts = { name: 'Specific hosts', value: 'hosts' as const };
  switch (verb) {
    case 'list':
      return [
        { name: 'Pending requests', value: 'pending' },
        { name: 'All hosts', value: ALL },
        { name: 'Signed hosts', value: SIGNED },
        hosts,
      ];
    case 'generate':
      return [hosts];
    case 'sign':
      return [{ name: 'All pending requests', value: ALL }, hosts];
    default:
      return [{ name: 'All signed hosts', value: ALL }, hosts];
  }
}

/** Split a host prompt answer on commas and whitespace. */
export function parseHosts(answer: string): string[] {
  return answer.split(/[\s,]+/).filter((host) => host.length > 0);
}

/** Prompt for a verb and its targets, then run it. */
export async function handleInteractiveMode(options: InteractiveOptions, context: CliContext) {
  heading('certadm interactive mode');
  const action = await select<Verb | 'exit'>({
    message: 'Choose action:',
    choices: [
      ...INTERFACE_METHODS.map((verb) => ({ name: VERB_LABELS[verb], value: verb })),
      { name: 'Exit', value: 'exit' as const },
    ],
  });
  if (action === 'exit') {
    render.line('Bye');
    return;
  }

  const choices = targetChoices(action);
  const target = choices.length === 1 ? 'hosts' : await select<Target>({ message: 'Apply to:', choices });
  const hosts =
    target === 'hosts' ? parseHosts(await input({ message: 'Host names (comma or space separated):' })) : [];

  if (DESTRUCTIVE.includes(action)) {
    const subject = target === ALL ? 'all signed hosts' : hosts.join(', ');
    const proceed = await confirm({ message: `Really ${action} ${subject}?`, default: false });
    if (!proceed) {
      render.warn('Cancelled');
      return;
    }
  }

  const allowDnsAltNames =
    action === 'sign' ? await confirm({ message: 'Allow DNS alt names?', default: false }) : false;

  await handleVerbCommand(
    action,
    {
      hosts,
      all: target === ALL,
      signed: target === SIGNED,
      allowDnsAltNames,
      caModule: options.caModule,
      trace: options.trace,
    },
    context,
  );
}

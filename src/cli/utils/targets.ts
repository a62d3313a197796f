import { ALL, InvalidArgumentError, SIGNED } from '../../lib/index.js';

/** Target flags shared by every verb command. */
export interface TargetFlags {
  all?: boolean;
  signed?: boolean;
}

/** Turn positional hosts plus `--all`/`--signed` into the interface's `to` value. */
export function resolveTargets(hosts: readonly string[], flags: TargetFlags): string[] | typeof ALL | typeof SIGNED {
  if (flags.all && flags.signed) {
    throw new InvalidArgumentError('--all and --signed cannot be combined');
  }
  if ((flags.all || flags.signed) && hosts.length > 0) {
    throw new InvalidArgumentError(
      `Host names cannot be combined with --${flags.all ? ALL : SIGNED}`,
      { hosts },
    );
  }
  if (flags.all) return ALL;
  if (flags.signed) return SIGNED;
  return [...hosts];
}

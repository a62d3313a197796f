import { InvalidArgumentError } from '../errors/interface-errors.js';

/** Every host the CA knows about. */
export const ALL = 'all';
/** Only hosts holding a signed certificate. */
export const SIGNED = 'signed';

/**
 * Hosts an operation applies to. `undefined` means no explicit target:
 * `list` then falls back to the pending requests, every other verb refuses it.
 */
export type SubjectSelection = readonly string[] | typeof ALL | typeof SIGNED | undefined;

function isHostList(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every((host) => typeof host === 'string');
}

/**
 * Validate a target selection. An empty host list becomes `undefined`.
 */
export function normalizeSubjects(value: unknown): SubjectSelection {
  if (value === ALL || value === SIGNED) return value;
  if (!isHostList(value)) throw InvalidArgumentError.invalidSubjects(value);
  return value.length === 0 ? undefined : [...value];
}

import { InvalidArgumentError } from '../errors/interface-errors.js';

/** Administrative verbs accepted by the interface. */
export const INTERFACE_METHODS = [
  'destroy',
  'list',
  'revoke',
  'generate',
  'sign',
  'print',
  'verify',
] as const;

export type Verb = (typeof INTERFACE_METHODS)[number];

/** Verbs without a dedicated handler; applied host by host. */
export type PerHostVerb = 'destroy' | 'revoke' | 'verify';

export function isVerb(value: unknown): value is Verb {
  return INTERFACE_METHODS.some((verb) => verb === value);
}

export function assertVerb(value: unknown): Verb {
  if (!isVerb(value)) throw InvalidArgumentError.invalidMethod(value);
  return value;
}

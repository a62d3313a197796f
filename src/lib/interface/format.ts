import type { SubjectAltNamesSource } from './certificate-authority.js';

export type HostCategory = 'request' | 'signed' | 'invalid';

/** Render order of the categories before the final sort. */
export const CATEGORY_ORDER: readonly HostCategory[] = ['request', 'signed', 'invalid'];

const GLYPHS: Record<HostCategory, string> = {
  request: ' ',
  signed: '+',
  invalid: '-',
};

export interface HostEntry {
  certificate?: SubjectAltNamesSource;
  verifyError?: string;
}

export type Classification = Record<HostCategory, Map<string, HostEntry>>;

/** Length of the longest classified host name, 0 when nothing was classified. */
export function nameWidth(certs: Classification): number {
  let width = 0;
  for (const type of CATEGORY_ORDER) {
    for (const host of certs[type].keys()) width = Math.max(width, host.length);
  }
  return width;
}

function altNamesOf(host: string, type: HostCategory, entry: HostEntry): string[] {
  // invalid certificates never show their alt names
  if (type === 'invalid') return [];
  return (entry.certificate?.subjectAltNames ?? []).filter((name) => name !== host);
}

/**
 * One report line: glyph, padded host, then the optional alt names and
 * verification error, separated by single spaces.
 */
export function formatHost(host: string, type: HostCategory, entry: HostEntry, width: number): string {
  const altNames = altNamesOf(host, type, entry);
  const parts = [GLYPHS[type], host.padEnd(width)];
  if (altNames.length > 0) parts.push(`(alt names: ${altNames.join(', ')})`);
  if (entry.verifyError !== undefined) parts.push(`(${entry.verifyError})`);
  return parts.join(' ');
}

/** Every entry of every category, rendered and sorted as plain text. */
export function formatReport(certs: Classification): string {
  const width = nameWidth(certs);
  const lines: string[] = [];
  for (const type of CATEGORY_ORDER) {
    for (const [host, entry] of certs[type]) lines.push(formatHost(host, type, entry, width));
  }
  return lines.sort().join('\n');
}

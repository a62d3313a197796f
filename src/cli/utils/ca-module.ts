import { resolve } from 'path';
import { pathToFileURL } from 'url';
import { InvalidArgumentError, type CertificateAuthority } from '../../lib/index.js';
import { debugCli } from '../../lib/utils/debug.js';

const CA_METHODS = [
  'list',
  'waiting',
  'verify',
  'generate',
  'sign',
  'revoke',
  'destroy',
  'print',
  'findCertificate',
  'findRequest',
] as const satisfies readonly (keyof CertificateAuthority)[];

export function isCertificateAuthority(value: unknown): value is CertificateAuthority {
  return (
    typeof value === 'object' &&
    value !== null &&
    CA_METHODS.every((method) => typeof Reflect.get(value, method) === 'function')
  );
}

function factoryOf(loaded: unknown): unknown {
  if (typeof loaded !== 'object' || loaded === null) return undefined;
  const named: unknown = Reflect.get(loaded, 'createCertificateAuthority');
  if (typeof named === 'function') return named;
  const fallback: unknown = Reflect.get(loaded, 'default');
  if (typeof fallback === 'function') return fallback;
  return factoryOf(fallback);
}

/**
 * Build the CA from an already imported module: it must export
 * `createCertificateAuthority()`, by name or as its default export.
 */
export async function createFromModule(
  loaded: unknown,
  modulePath: string,
): Promise<CertificateAuthority> {
  const factory = factoryOf(loaded);
  if (typeof factory !== 'function') {
    throw new InvalidArgumentError(`${modulePath} does not export createCertificateAuthority()`, {
      modulePath,
    });
  }
  const ca: unknown = await factory();
  if (!isCertificateAuthority(ca)) {
    throw new InvalidArgumentError(
      `createCertificateAuthority() in ${modulePath} did not return a certificate authority`,
      { modulePath },
    );
  }
  return ca;
}

/** Import the CA implementation named on the command line. */
export async function loadCertificateAuthority(
  modulePath: string | undefined,
): Promise<CertificateAuthority> {
  if (!modulePath) {
    throw new InvalidArgumentError('No CA module given; use --ca-module or set CERTADM_CA_MODULE');
  }
  const url = pathToFileURL(resolve(modulePath)).href;
  debugCli('loading CA module %s', url);
  const loaded: unknown = await import(url);
  return createFromModule(loaded, modulePath);
}

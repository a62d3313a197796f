import { describe, test, expect, jest } from '@jest/globals';
import { runCli } from '../../src/cli/program.js';
import { createFakeCa, createRecordingReporter, type FakeCa } from '../helpers/fake-ca.js';

// Utility to run with test env
function withTestEnv(fn: () => Promise<void>) {
  return async () => {
    process.env.CERTADM_CLI_TEST = '1';
    try {
      await fn();
    } finally {
      delete process.env.CERTADM_CLI_TEST;
    }
  };
}

function dependencies(ca: FakeCa) {
  const recording = createRecordingReporter();
  const resolveCa = jest.fn(async (_modulePath: string | undefined) => ca);
  return { ...recording, resolveCa, deps: { reporter: recording.reporter, resolveCa } };
}

describe('certadm CLI', () => {
  test(
    'shows help without exiting',
    withTestEnv(async () => {
      const write = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
      try {
        await expect(runCli(['--help'])).resolves.toBeDefined();
      } finally {
        write.mockRestore();
      }
    }),
  );

  test(
    'lists every host with --all',
    withTestEnv(async () => {
      const ca = createFakeCa({ signed: ['web01'], waiting: ['db01'] });
      const { deps, out, err } = dependencies(ca);

      await runCli(['list', '--all'], deps);

      expect(out).toEqual(['  db01 \n+ web01']);
      expect(err).toEqual([]);
    }),
  );

  test(
    'lists pending requests by default',
    withTestEnv(async () => {
      const ca = createFakeCa({ signed: ['web01'], waiting: ['db01'] });
      const { deps, out } = dependencies(ca);

      await runCli(['list'], deps);

      expect(out).toEqual(['  db01']);
    }),
  );

  test(
    'hands the configured CA module to the resolver',
    withTestEnv(async () => {
      const ca = createFakeCa();
      const { deps, resolveCa } = dependencies(ca);

      await runCli(['--ca-module', './my-ca.js', 'destroy', 'h1', 'h2'], deps);

      expect(resolveCa).toHaveBeenCalledWith('./my-ca.js');
      expect(ca.destroy.mock.calls).toEqual([['h1'], ['h2']]);
    }),
  );

  test(
    'forwards --allow-dns-alt-names to sign',
    withTestEnv(async () => {
      const ca = createFakeCa({ waiting: ['web01'] });
      const { deps } = dependencies(ca);

      await runCli(['sign', '--all', '--allow-dns-alt-names'], deps);

      expect(ca.sign.mock.calls).toEqual([['web01', true]]);
    }),
  );

  test(
    'forwards --dns-alt-names to generate',
    withTestEnv(async () => {
      const ca = createFakeCa();
      const { deps } = dependencies(ca);

      await runCli(['generate', 'web01', '--dns-alt-names', 'web,www'], deps);

      expect(ca.generate.mock.calls).toEqual([['web01', { dnsAltNames: 'web,www' }]]);
    }),
  );

  test(
    'enables trace output from the environment',
    withTestEnv(async () => {
      process.env.CERTADM_TRACE = '1';
      try {
        const ca = createFakeCa();
        const failure = new Error('permission denied');
        ca.revoke.mockRejectedValue(failure);
        const { deps, err } = dependencies(ca);

        await runCli(['revoke', 'web01'], deps);

        expect(err).toEqual([failure.stack, 'Could not call revoke: permission denied']);
      } finally {
        delete process.env.CERTADM_TRACE;
      }
    }),
  );
});

import { ManifestError } from '@warden/shared';
import { describe, expect, it } from 'vitest';
import { RPM_QUERY_FORMAT, removeEpoch, rpm } from './rpm.js';
import type { CommandRunner } from './types.js';

function record(packageName: string, packageVersion: string) {
  return { osName: 'rocky', osVersion: '9.3', packageName, packageVersion };
}

describe('removeEpoch', () => {
  it('strips the epoch prefix', () => {
    expect(removeEpoch('0:5.14.0-362.el9')).toBe('5.14.0-362.el9');
  });

  it('leaves versions without an epoch unchanged', () => {
    expect(removeEpoch('5.14.0-362.el9')).toBe('5.14.0-362.el9');
  });

  it('only strips up to the first colon', () => {
    expect(removeEpoch('1:2.0:beta-1')).toBe('2.0:beta-1');
  });
});

describe('rpm.listPackages', () => {
  it('queries rpm with the name,epoch:version-release format', async () => {
    const calls: Array<[string, string[]]> = [];
    const run: CommandRunner = async (cmd, args) => {
      calls.push([cmd, args]);
      return { stdout: 'bash,0:5.1.8-6.el9\n', stderr: '', exitCode: 0 };
    };

    const out = await rpm.listPackages(run);

    expect(out).toBe('bash,0:5.1.8-6.el9\n');
    expect(calls).toEqual([['rpm', ['-qa', '--queryformat', RPM_QUERY_FORMAT]]]);
  });

  it('fails with PACKAGE_QUERY_FAILED on a non-zero exit', async () => {
    const run: CommandRunner = async () => ({ stdout: '', stderr: 'rpmdb open failed', exitCode: 1 });

    const err = await rpm.listPackages(run).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ManifestError);
    expect(err).toMatchObject({ code: 'PACKAGE_QUERY_FAILED' });
  });
});

describe('rpm kernel matching', () => {
  it('treats only the literal kernel package as a kernel', () => {
    expect(rpm.isKernelPackage(record('kernel', '0:5.14.0-362.el9'))).toBe(true);
    expect(rpm.isKernelPackage(record('kernel-core', '0:5.14.0-362.el9'))).toBe(false);
    expect(rpm.isKernelPackage(record('bash', '0:5.1.8-6.el9'))).toBe(false);
  });

  it('compares the version without its epoch', () => {
    expect(rpm.kernelVersion(record('kernel', '0:5.14.0-362.el9'))).toBe('5.14.0-362.el9');
  });
});

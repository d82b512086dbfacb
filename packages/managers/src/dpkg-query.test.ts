import { describe, expect, it } from 'vitest';
import { DPKG_SHOW_FORMAT, dpkgQuery } from './dpkg-query.js';
import type { CommandRunner } from './types.js';

function record(packageName: string, packageVersion: string) {
  return { osName: 'ubuntu', osVersion: '22.04', packageName, packageVersion };
}

describe('dpkgQuery.listPackages', () => {
  it('queries dpkg-query with the name,version format', async () => {
    let seen: [string, string[]] | undefined;
    const run: CommandRunner = async (cmd, args) => {
      seen = [cmd, args];
      return { stdout: 'bash,5.1-6ubuntu1\n', stderr: '', exitCode: 0 };
    };

    await expect(dpkgQuery.listPackages(run)).resolves.toBe('bash,5.1-6ubuntu1\n');
    expect(seen).toEqual(['dpkg-query', ['--show', '--showformat', DPKG_SHOW_FORMAT]]);
  });
});

describe('dpkgQuery kernel matching', () => {
  it('treats linux-image-* packages as kernels', () => {
    expect(dpkgQuery.isKernelPackage(record('linux-image-5.15.0-91-generic', '5.15.0-91.101'))).toBe(true);
    expect(dpkgQuery.isKernelPackage(record('linux-headers-5.15.0-91', '5.15.0-91.101'))).toBe(false);
  });

  it('does not match the prefix in the middle of a name', () => {
    expect(dpkgQuery.isKernelPackage(record('signed-linux-image-5.15.0', '1.0'))).toBe(false);
  });

  it('derives the kernel version from the package name', () => {
    expect(dpkgQuery.kernelVersion(record('linux-image-5.15.0-91-generic', '5.15.0-91.101'))).toBe(
      '5.15.0-91-generic',
    );
  });
});

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { CommandResult, CommandRunner } from '@warden/managers';
import { toWireManifest } from '@warden/shared';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { logger } from '../packages/cli/src/logger.js';
import { ManifestGenerator } from '../packages/cli/src/manifest/generator.js';

/** Answers like a host with the given commands on PATH and the given outputs */
function fakeHost(outputs: Record<string, string>): CommandRunner {
  return async (cmd, args): Promise<CommandResult> => {
    if (cmd === 'which') {
      const name = args[0] ?? '';
      const present = Object.keys(outputs).some((key) => key.startsWith(`${name} `));
      return { stdout: present ? `/usr/bin/${name}\n` : '', stderr: '', exitCode: present ? 0 : 1 };
    }
    const stdout = outputs[[cmd, ...args].join(' ')];
    if (stdout === undefined) return { stdout: '', stderr: `${cmd}: not found`, exitCode: 127 };
    return { stdout, stderr: '', exitCode: 0 };
  };
}

describe('package manifest pipeline', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'warden-pipeline-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  let written = 0;

  beforeEach(() => {
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function writeOsRelease(content: string): string {
    written += 1;
    const file = path.join(dir, `os-release-${written}`);
    fs.writeFileSync(file, content);
    return file;
  }

  it('drops the inactive rpm kernel and keeps everything else', async () => {
    const osReleaseFile = writeOsRelease('ID="rhel"\nVERSION_ID="8.9"\n');
    const run = fakeHost({
      'rpm -qa --queryformat %{NAME},%|EPOCH?{%{EPOCH}}:{0}|:%{VERSION}-%{RELEASE}\n': 'kernel,5.10.0-1\nbash,5.1-2\n',
      'uname -r': '5.10.0-2.el8\n',
    });

    const manifest = await new ManifestGenerator({ run, osReleaseFile }).generate();

    expect(toWireManifest(manifest)).toEqual({
      os_pkg_info_list: [{ os: 'rhel', os_ver: '8.9', pkg: 'bash', pkg_ver: '5.1-2' }],
    });
  });

  it('keeps the dpkg kernel that matches the running kernel', async () => {
    const osReleaseFile = writeOsRelease('ID=debian\nVERSION_ID="12"\n');
    const run = fakeHost({
      'dpkg-query --show --showformat ${Package},${Version}\n': 'linux-image-5.10.0,1.0\ncurl,7.2\n',
      'uname -r': '5.10.0-generic\n',
    });

    const manifest = await new ManifestGenerator({ run, osReleaseFile }).generate();

    expect(manifest.records.map((r) => r.packageName)).toEqual(['linux-image-5.10.0', 'curl']);
  });

  it('skips a malformed line without losing the rest', async () => {
    const osReleaseFile = writeOsRelease('ID=ubuntu\nVERSION_ID="24.04"\n');
    const run = fakeHost({
      'dpkg-query --show --showformat ${Package},${Version}\n': 'onlyonefield\nzlib1g,1:1.3\n',
      'uname -r': '6.8.0-31-generic\n',
    });

    const manifest = await new ManifestGenerator({ run, osReleaseFile }).generate();

    expect(manifest.records).toEqual([
      { osName: 'ubuntu', osVersion: '24.04', packageName: 'zlib1g', packageVersion: '1:1.3' },
    ]);
  });

  it('prefers dpkg-query when both managers are installed', async () => {
    const osReleaseFile = writeOsRelease('ID=ubuntu\nVERSION_ID="22.04"\n');
    const run = fakeHost({
      'dpkg-query --show --showformat ${Package},${Version}\n': 'bash,5.1-6ubuntu1\n',
      'rpm -qa --queryformat %{NAME},%|EPOCH?{%{EPOCH}}:{0}|:%{VERSION}-%{RELEASE}\n': 'rpm,0:4.17.0-1\n',
      'uname -r': '5.15.0-91-generic\n',
    });

    const manifest = await new ManifestGenerator({ run, osReleaseFile }).generate();

    expect(manifest.records.map((r) => r.packageName)).toEqual(['bash']);
  });
});

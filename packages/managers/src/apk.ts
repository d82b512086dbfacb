import { runQuery } from './query.js';
import type { PackageManager } from './types.js';

function splitLines(stdout: string): string[] {
  const trimmed = stdout.endsWith('\n') ? stdout.slice(0, -1) : stdout;
  return trimmed.split('\n');
}

/**
 * Rebuild `name,version` lines from `apk info` (names) and `apk info -v`
 * (`name-version`). Entries are paired by position, so both listings must
 * come back in the same order. A versioned entry with no name at its
 * position is passed through without a separator and is later skipped as
 * malformed.
 */
export function pairApkListings(names: string[], versioned: string[]): string[] {
  return versioned.map((entry, i) => {
    const name = names[i];
    if (name === undefined) return entry;
    const version = entry.replace(name, '').replace(/^-+|-+$/g, '');
    return `${name},${version}`;
  });
}

export const apk: PackageManager = {
  name: 'apk',

  async listPackages(run) {
    const names = splitLines(await runQuery(run, 'apk', ['info']));
    const versioned = splitLines(await runQuery(run, 'apk', ['info', '-v']));
    return pairApkListings(names, versioned).join('\n');
  },

  isKernelPackage() {
    return false;
  },

  kernelVersion(record) {
    return record.packageVersion;
  },
};

import type { PackageRecord } from '@warden/shared';
import { runQuery } from './query.js';
import type { PackageManager } from './types.js';

/** Emits `name,epoch:version-release`, with a missing epoch reported as 0 */
export const RPM_QUERY_FORMAT = '%{NAME},%|EPOCH?{%{EPOCH}}:{0}|:%{VERSION}-%{RELEASE}\n';

const KERNEL_PACKAGE = 'kernel';

/** Drop the epoch (everything up to the first colon) from an rpm version */
export function removeEpoch(version: string): string {
  const idx = version.indexOf(':');
  return idx === -1 ? version : version.slice(idx + 1);
}

export const rpm: PackageManager = {
  name: 'rpm',

  listPackages(run) {
    return runQuery(run, 'rpm', ['-qa', '--queryformat', RPM_QUERY_FORMAT]);
  },

  // Only the literal `kernel` package; kernel-core and friends are not matched.
  isKernelPackage(record: PackageRecord) {
    return record.packageName === KERNEL_PACKAGE;
  },

  kernelVersion(record: PackageRecord) {
    return removeEpoch(record.packageVersion);
  },
};

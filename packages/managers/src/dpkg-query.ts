import type { PackageRecord } from '@warden/shared';
import { runQuery } from './query.js';
import type { PackageManager } from './types.js';

export const DPKG_SHOW_FORMAT = '${Package},${Version}\n';

const KERNEL_PACKAGE_PREFIX = 'linux-image-';

export const dpkgQuery: PackageManager = {
  name: 'dpkg-query',

  listPackages(run) {
    return runQuery(run, 'dpkg-query', ['--show', '--showformat', DPKG_SHOW_FORMAT]);
  },

  isKernelPackage(record: PackageRecord) {
    return record.packageName.startsWith(KERNEL_PACKAGE_PREFIX);
  },

  /** linux-image-5.15.0-91-generic → 5.15.0-91-generic */
  kernelVersion(record: PackageRecord) {
    return record.packageName.slice(KERNEL_PACKAGE_PREFIX.length);
  },
};

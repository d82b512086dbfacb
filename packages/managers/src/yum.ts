import { ManifestError, ManifestErrorCode } from '@warden/shared';
import type { PackageManager } from './types.js';

/** Recognised but not enumerable yet */
export const yum: PackageManager = {
  name: 'yum',

  async listPackages() {
    throw new ManifestError(ManifestErrorCode.NOT_YET_SUPPORTED, 'yum not yet supported');
  },

  isKernelPackage() {
    return false;
  },

  kernelVersion(record) {
    return record.packageVersion;
  },
};

import type { CommandRunner, PackageManager } from '@warden/managers';
import type { PackageManifest, PackageRecord } from '@warden/shared';
import { logger } from '../logger.js';

export interface SuppressedKernel {
  /** Position of the record in the unfiltered manifest */
  index: number;
  record: PackageRecord;
}

export interface KernelFilterResult {
  manifest: PackageManifest;
  /** `undefined` when the running kernel could not be determined */
  activeKernel?: string;
  suppressed: SuppressedKernel[];
}

/** Running kernel release from `uname -r`, or undefined if it cannot be read */
export async function detectActiveKernel(run: CommandRunner): Promise<string | undefined> {
  try {
    const result = await run('uname', ['-r']);
    if (result.exitCode === 0) {
      return result.stdout.replace(/\n$/, '');
    }
    logger.warn(
      { cmd: 'uname -r', exitCode: result.exitCode, stderr: result.stderr },
      'unable to detect active kernel',
    );
  } catch (err) {
    logger.warn({ cmd: 'uname -r', err }, 'unable to detect active kernel');
  }
  return undefined;
}

/**
 * Drop kernel packages that are installed but not running. Versions are
 * matched by substring since `uname -r` carries build and arch suffixes.
 * Returns a new manifest; the input is not modified.
 */
export function removeInactiveKernels(
  manifest: PackageManifest,
  manager: PackageManager,
  activeKernel: string,
): Omit<KernelFilterResult, 'activeKernel'> {
  const records: PackageRecord[] = [];
  const suppressed: SuppressedKernel[] = [];

  manifest.records.forEach((record, index) => {
    if (manager.isKernelPackage(record) && !activeKernel.includes(manager.kernelVersion(record))) {
      logger.warn(
        { pkgName: record.packageName, pkgVersion: record.packageVersion, activeKernel },
        'inactive kernel package detected, removing from generated pkg manifest',
      );
      suppressed.push({ index, record });
      return;
    }
    records.push(record);
  });

  const filtered: PackageManifest = { records };
  if (suppressed.length > 0) {
    logger.debug({ manifest: filtered }, 'package-manifest modified');
  }
  return { manifest: filtered, suppressed };
}

/** Detect the running kernel and filter; skipped entirely if detection fails */
export async function filterInactiveKernels(
  manifest: PackageManifest,
  manager: PackageManager,
  run: CommandRunner,
): Promise<KernelFilterResult> {
  const activeKernel = await detectActiveKernel(run);
  if (activeKernel === undefined) {
    return { manifest, suppressed: [] };
  }
  return { activeKernel, ...removeInactiveKernels(manifest, manager, activeKernel) };
}

import { type CommandRunner, type PackageManager, packageManagerRegistry } from '@warden/managers';
import {
  ManifestError,
  ManifestErrorCode,
  type OsInfo,
  type PackageManifest,
  type PackageRecord,
} from '@warden/shared';
import { logger } from '../logger.js';

/**
 * Parse `name,version` lines into records. Lines that do not split into
 * exactly two fields are logged and skipped.
 */
export function parseManagerQuery(raw: string, osInfo: OsInfo): PackageRecord[] {
  const records: PackageRecord[] = [];

  for (const line of raw.replace(/\n$/, '').split('\n')) {
    const fields = line.split(',');
    const [packageName, packageVersion] = fields;
    if (fields.length !== 2 || packageName === undefined || packageVersion === undefined) {
      logger.warn(
        { rawPkgDetails: line, splitPkgDetails: fields },
        'unable to parse package, expected length=2, skipping',
      );
      continue;
    }

    records.push({ osName: osInfo.name, osVersion: osInfo.version, packageName, packageVersion });
  }

  return records;
}

export function resolvePackageManager(
  name: string,
  registry: ReadonlyMap<string, PackageManager> = packageManagerRegistry,
): PackageManager {
  const manager = registry.get(name);
  if (!manager) {
    throw new ManifestError(
      ManifestErrorCode.INTERNAL_ERROR,
      `package-manager "${name}" was detected but cannot be enumerated. This is most likely a bug, please report it.`,
    );
  }
  return manager;
}

export async function enumeratePackages(
  manager: PackageManager,
  osInfo: OsInfo,
  run: CommandRunner,
): Promise<PackageManifest> {
  const raw = await manager.listPackages(run);
  logger.debug({ raw }, 'package-manager query');

  const manifest: PackageManifest = { records: parseManagerQuery(raw, osInfo) };
  logger.debug({ manifest }, 'package-manifest');
  return manifest;
}

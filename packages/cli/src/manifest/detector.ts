import type { CommandResult, CommandRunner } from '@warden/managers';
import {
  ManifestError,
  ManifestErrorCode,
  type PackageManagerName,
  SUPPORTED_PACKAGE_MANAGERS,
} from '@warden/shared';
import { logger } from '../logger.js';

/** `command -v` is a shell builtin, so it needs a shell; the name is passed as $1 */
async function checkWithNativeCommand(run: CommandRunner, name: string): Promise<boolean> {
  try {
    const result = await run('sh', ['-c', 'command -v "$1"', 'sh', name]);
    return result.exitCode === 0;
  } catch (err) {
    logger.debug({ cmd: 'command', packageManager: name, err }, 'error trying to check package-manager');
    return false;
  }
}

/**
 * Whether `name` resolves on PATH. Uses `which`, falling back to
 * `command -v` when `which` cannot be run or ends without an exit status.
 */
export async function commandExists(run: CommandRunner, name: string): Promise<boolean> {
  let result: CommandResult;
  try {
    result = await run('which', [name]);
  } catch (err) {
    logger.debug({ cmd: 'which', packageManager: name, err }, 'error trying to check package-manager');
    logger.warn("something went wrong with 'which', trying native command");
    return checkWithNativeCommand(run, name);
  }

  if (result.exitCode === null) {
    logger.warn({ signal: result.signal }, "'which' terminated abnormally, trying native command");
    return checkWithNativeCommand(run, name);
  }
  return result.exitCode === 0;
}

/** First manager of `managers`, in order, that is present on the host */
export async function detectPackageManager(
  run: CommandRunner,
  managers: readonly PackageManagerName[] = SUPPORTED_PACKAGE_MANAGERS,
): Promise<PackageManagerName> {
  logger.debug('detecting package-manager');

  for (const manager of managers) {
    if (await commandExists(run, manager)) {
      logger.debug({ packageManager: manager }, 'detected');
      return manager;
    }
  }

  throw new ManifestError(
    ManifestErrorCode.NO_PACKAGE_MANAGER_FOUND,
    `unable to find supported package managers. Supported package managers are ${managers.join(', ')}.`,
  );
}

import { ManifestError, ManifestErrorCode } from '@warden/shared';
import type { CommandRunner } from './types.js';

/**
 * Run a package listing command and return its stdout.
 * Spawn failures and non-zero exits become PACKAGE_QUERY_FAILED.
 */
export async function runQuery(run: CommandRunner, command: string, args: string[]): Promise<string> {
  let cause: Error;
  try {
    const result = await run(command, args);
    if (result.exitCode === 0) return result.stdout;

    const status = result.exitCode === null ? `signal ${result.signal ?? 'unknown'}` : `exit status ${result.exitCode}`;
    cause = new Error(`${command} terminated with ${status}: ${result.stderr.trim()}`);
  } catch (err) {
    cause = err instanceof Error ? err : new Error(String(err));
  }

  throw new ManifestError(
    ManifestErrorCode.PACKAGE_QUERY_FAILED,
    `unable to query packages from package manager: ${cause.message}`,
    { cause },
  );
}

import type { PackageManagerName, PackageRecord } from '@warden/shared';

/** Outcome of a finished process */
export interface CommandResult {
  stdout: string;
  stderr: string;
  /** `null` when the process ended without an exit status (killed by a signal) */
  exitCode: number | null;
  signal?: string;
}

/**
 * Runs a command without a shell. Resolves once the process exits, whatever
 * its status; rejects only when the process cannot be started.
 */
export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

/** Per-manager capability used by enumeration and kernel filtering */
export interface PackageManager {
  name: PackageManagerName;
  /** Installed packages as `name,version` lines */
  listPackages(run: CommandRunner): Promise<string>;
  isKernelPackage(record: PackageRecord): boolean;
  /** Version a kernel package must share with the running kernel to be kept */
  kernelVersion(record: PackageRecord): string;
}

import { apk } from './apk.js';
import { dpkgQuery } from './dpkg-query.js';
import { rpm } from './rpm.js';
import type { PackageManager } from './types.js';
import { yum } from './yum.js';

export type { CommandResult, CommandRunner, PackageManager } from './types.js';
export { rpm } from './rpm.js';
export { dpkgQuery } from './dpkg-query.js';
export { apk } from './apk.js';

/** Index package managers by name; later entries win on a duplicate name */
export function createManagerRegistry(managers: PackageManager[]): ReadonlyMap<string, PackageManager> {
  return new Map(managers.map((manager) => [manager.name, manager]));
}

/** Registry of all built-in package managers, keyed by name */
export const packageManagerRegistry: ReadonlyMap<string, PackageManager> = createManagerRegistry([
  dpkgQuery,
  rpm,
  apk,
  yum,
]);

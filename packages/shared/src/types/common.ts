import { z } from 'zod';

export const PackageManagerName = z.enum(['dpkg-query', 'rpm', 'apk', 'yum']);
export type PackageManagerName = z.infer<typeof PackageManagerName>;

/** Package managers probed on a host, in priority order */
export const SUPPORTED_PACKAGE_MANAGERS: readonly PackageManagerName[] = ['dpkg-query', 'rpm'];

/** Release descriptor used to identify the distribution */
export const OS_RELEASE_FILE = '/etc/os-release';

/** Telemetry feature name for manifest generation */
export const FEATURE_GEN_PKG_MANIFEST = 'gen_pkg_manifest';

/** Vulnerability scan endpoint, relative to the API base URL */
export const SCAN_PKG_MANIFEST_PATH = '/api/v1/external/vulnerabilities/scan';

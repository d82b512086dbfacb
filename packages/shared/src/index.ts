// Types
export {
  PackageManagerName,
  SUPPORTED_PACKAGE_MANAGERS,
  OS_RELEASE_FILE,
  FEATURE_GEN_PKG_MANIFEST,
  SCAN_PKG_MANIFEST_PATH,
} from './types/common.js';

// Schemas — Manifest
export {
  OsInfo,
  PackageRecord,
  PackageManifest,
  WirePackage,
  WireManifest,
  toWireManifest,
  fromWireManifest,
} from './schemas/manifest.js';

// Schemas — Scan
export { ScanResponse } from './schemas/scan.js';

// Errors
export { ManifestError, ManifestErrorCode } from './errors/manifest-error.js';

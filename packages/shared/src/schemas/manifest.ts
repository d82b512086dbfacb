import { z } from 'zod';

/** Distribution identity read from the release descriptor */
export const OsInfo = z.object({
  /** `ID` field, e.g. "ubuntu" */
  name: z.string(),
  /** `VERSION_ID` field, e.g. "22.04" */
  version: z.string(),
});
export type OsInfo = z.infer<typeof OsInfo>;

/** One installed package as reported by the package manager */
export const PackageRecord = z.object({
  osName: z.string(),
  osVersion: z.string(),
  packageName: z.string(),
  packageVersion: z.string(),
});
export type PackageRecord = z.infer<typeof PackageRecord>;

/** Installed-software inventory of a host, in enumeration order */
export const PackageManifest = z.object({
  records: z.array(PackageRecord),
});
export type PackageManifest = z.infer<typeof PackageManifest>;

/** Package entry as submitted to the vulnerability API */
export const WirePackage = z.object({
  os: z.string(),
  os_ver: z.string(),
  pkg: z.string(),
  pkg_ver: z.string(),
});
export type WirePackage = z.infer<typeof WirePackage>;

/** Manifest body as submitted to the vulnerability API */
export const WireManifest = z.object({
  os_pkg_info_list: z.array(WirePackage),
});
export type WireManifest = z.infer<typeof WireManifest>;

export function toWireManifest(manifest: PackageManifest): WireManifest {
  return {
    os_pkg_info_list: manifest.records.map((record) => ({
      os: record.osName,
      os_ver: record.osVersion,
      pkg: record.packageName,
      pkg_ver: record.packageVersion,
    })),
  };
}

/**
 * Parse a manifest in wire format, e.g. one written by
 * `warden vulnerability host generate-pkg-manifest`.
 * Throws a ZodError when the shape does not match.
 */
export function fromWireManifest(raw: unknown): PackageManifest {
  const wire = WireManifest.parse(raw);
  return {
    records: wire.os_pkg_info_list.map((pkg) => ({
      osName: pkg.os,
      osVersion: pkg.os_ver,
      packageName: pkg.pkg,
      packageVersion: pkg.pkg_ver,
    })),
  };
}

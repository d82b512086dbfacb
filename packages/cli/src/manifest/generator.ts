import { type CommandRunner, type PackageManager, packageManagerRegistry } from '@warden/managers';
import {
  FEATURE_GEN_PKG_MANIFEST,
  OS_RELEASE_FILE,
  type PackageManagerName,
  type PackageManifest,
  SUPPORTED_PACKAGE_MANAGERS,
} from '@warden/shared';
import { defaultRunner } from '../runtime/runner.js';
import { TelemetryEvent } from '../telemetry/event.js';
import { type TelemetrySink, noopTelemetrySink } from '../telemetry/sink.js';
import { detectPackageManager } from './detector.js';
import { enumeratePackages, resolvePackageManager } from './enumerator.js';
import { filterInactiveKernels } from './kernel.js';
import { readOsInfo } from './os-release.js';

export interface ManifestGeneratorOptions {
  run?: CommandRunner;
  /** Managers to probe, in priority order */
  managers?: readonly PackageManagerName[];
  registry?: ReadonlyMap<string, PackageManager>;
  osReleaseFile?: string;
  telemetry?: TelemetrySink;
}

/**
 * Builds the package manifest of the local host:
 * os-release → package manager → package listing → inactive kernel filter.
 */
export class ManifestGenerator {
  private run: CommandRunner;
  private managers: readonly PackageManagerName[];
  private registry: ReadonlyMap<string, PackageManager>;
  private osReleaseFile: string;
  private telemetry: TelemetrySink;

  constructor(options: ManifestGeneratorOptions = {}) {
    this.run = options.run ?? defaultRunner;
    this.managers = options.managers ?? SUPPORTED_PACKAGE_MANAGERS;
    this.registry = options.registry ?? packageManagerRegistry;
    this.osReleaseFile = options.osReleaseFile ?? OS_RELEASE_FILE;
    this.telemetry = options.telemetry ?? noopTelemetrySink;
  }

  /**
   * Generate the manifest. `event` receives the feature fields and the
   * duration whatever the outcome, but is only sent here on success;
   * callers report failures themselves.
   */
  async generate(event = new TelemetryEvent(FEATURE_GEN_PKG_MANIFEST)): Promise<PackageManifest> {
    const start = Date.now();
    let manifest: PackageManifest;
    try {
      manifest = await this.build(event);
    } finally {
      event.durationMs = Date.now() - start;
    }
    await this.telemetry.send(event);
    return manifest;
  }

  private async build(event: TelemetryEvent): Promise<PackageManifest> {
    const osInfo = readOsInfo(this.osReleaseFile);
    event.addFeatureField('os', osInfo.name);
    event.addFeatureField('os_ver', osInfo.version);

    const managerName = await detectPackageManager(this.run, this.managers);
    event.addFeatureField('pkg_manager', managerName);

    const manager = resolvePackageManager(managerName, this.registry);
    const manifest = await enumeratePackages(manager, osInfo, this.run);
    event.addFeatureField('total_manifest_pkgs', manifest.records.length);

    const result = await filterInactiveKernels(manifest, manager, this.run);
    event.addFeatureField('active_kernel', result.activeKernel ?? '');
    for (const { index, record } of result.suppressed) {
      event.addFeatureField(`kernel_suppressed_${index}`, `${record.packageName}-${record.packageVersion}`);
    }
    return result.manifest;
  }
}

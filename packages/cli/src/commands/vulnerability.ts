import fs from 'node:fs';
import {
  FEATURE_GEN_PKG_MANIFEST,
  type PackageManifest,
  type ScanResponse,
  fromWireManifest,
  toWireManifest,
} from '@warden/shared';
import { ApiClient } from '../api/client.js';
import { type WardenConfig, loadConfig } from '../config.js';
import { ManifestGenerator } from '../manifest/generator.js';
import { TelemetryEvent } from '../telemetry/event.js';
import { type TelemetrySink, createHttpTelemetrySink, noopTelemetrySink } from '../telemetry/sink.js';

export interface VulnerabilityCommandDeps {
  generator: Pick<ManifestGenerator, 'generate'>;
  telemetry: TelemetrySink;
  createClient: () => Pick<ApiClient, 'scanPackageManifest'>;
  readFile: (path: string) => string;
  log: (msg: string) => void;
}

export interface ScanOptions {
  /** Generate the manifest from this host */
  local: boolean;
  /** Read a previously generated manifest instead */
  manifestFile?: string;
}

export function createTelemetrySink(config: WardenConfig): TelemetrySink {
  if (!config.telemetry || !config.telemetryUrl) return noopTelemetrySink;
  return createHttpTelemetrySink(config.telemetryUrl);
}

export function createDefaultDeps(config: WardenConfig = loadConfig()): VulnerabilityCommandDeps {
  const telemetry = createTelemetrySink(config);
  return {
    generator: new ManifestGenerator({ telemetry }),
    telemetry,
    createClient: () => {
      if (!config.apiUrl || !config.apiToken) {
        throw new Error('API access is not configured. Run "warden configure --url <url> --token <token>".');
      }
      return new ApiClient({ baseUrl: config.apiUrl, token: config.apiToken });
    },
    readFile: (path) => fs.readFileSync(path, 'utf-8'),
    log: console.log,
  };
}

/** Generate the manifest, reporting a failed run as its own telemetry event */
async function generateManifest(deps: VulnerabilityCommandDeps): Promise<PackageManifest> {
  const event = new TelemetryEvent(FEATURE_GEN_PKG_MANIFEST);
  try {
    return await deps.generator.generate(event);
  } catch (err) {
    event.error = err instanceof Error ? err.message : String(err);
    await deps.telemetry.send(event);
    throw err;
  }
}

function readManifestFile(path: string, deps: VulnerabilityCommandDeps): PackageManifest {
  let raw: unknown;
  try {
    raw = JSON.parse(deps.readFile(path));
  } catch (err) {
    throw new Error(`Unable to read package manifest from ${path}`, { cause: err });
  }
  try {
    return fromWireManifest(raw);
  } catch (err) {
    throw new Error(`Invalid package manifest in ${path}`, { cause: err });
  }
}

export async function cmdGeneratePkgManifest(deps: VulnerabilityCommandDeps): Promise<void> {
  const manifest = await generateManifest(deps);
  deps.log(JSON.stringify(toWireManifest(manifest), null, 2));
}

export async function cmdScanPkgManifest(
  options: ScanOptions,
  deps: VulnerabilityCommandDeps,
): Promise<ScanResponse> {
  if (options.local === (options.manifestFile !== undefined)) {
    throw new Error('Use exactly one of --local or --pkg-manifest <file>');
  }

  const manifest = options.manifestFile
    ? readManifestFile(options.manifestFile, deps)
    : await generateManifest(deps);

  const client = deps.createClient();
  const response = await client.scanPackageManifest(manifest);
  deps.log(JSON.stringify(response, null, 2));
  return response;
}

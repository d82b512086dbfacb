import {
  type PackageManifest,
  SCAN_PKG_MANIFEST_PATH,
  ScanResponse,
  toWireManifest,
} from '@warden/shared';
import { VERSION } from '../version.js';

const REQUEST_TIMEOUT_MS = 60_000;

export class ApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
  }
}

export interface ApiClientOptions {
  /** e.g. https://acme.example.net */
  baseUrl: string;
  token: string;
}

export class ApiClient {
  private baseUrl: string;
  private token: string;

  constructor(options: ApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
  }

  /** Submit a manifest for vulnerability assessment */
  async scanPackageManifest(manifest: PackageManifest): Promise<ScanResponse> {
    const res = await fetch(`${this.baseUrl}${SCAN_PKG_MANIFEST_PATH}`, {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.token}`,
        'User-Agent': `warden-cli/${VERSION}`,
      },
      body: JSON.stringify(toWireManifest(manifest)),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (!res.ok) {
      throw new ApiError(res.status, `Failed to scan package manifest (HTTP ${res.status})`);
    }

    const parsed = ScanResponse.safeParse(await res.json());
    if (!parsed.success) {
      throw new ApiError(res.status, 'Unexpected response from the vulnerability scan endpoint');
    }
    if (!parsed.data.ok) {
      throw new ApiError(res.status, parsed.data.message || 'Package manifest scan was rejected');
    }
    return parsed.data;
  }
}

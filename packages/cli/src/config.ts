import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

export const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevel>;

export const WardenConfig = z.object({
  /** Base URL of the platform API, e.g. https://acme.example.net */
  apiUrl: z.string().url().optional(),
  apiToken: z.string().min(1).optional(),
  /** Send usage events; disabled by WARDEN_TELEMETRY_DISABLE */
  telemetry: z.boolean().default(true),
  telemetryUrl: z.string().url().optional(),
  logLevel: LogLevel.optional(),
});
export type WardenConfig = z.infer<typeof WardenConfig>;

export function getConfigDir(): string {
  return process.env.WARDEN_HOME || path.join(os.homedir(), '.warden');
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Raw contents of the config file; an absent file is an empty object */
function readConfigFile(file: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw new Error(`Cannot read config at ${file}. Check file permissions.`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Config file corrupted at ${file}. Re-run "warden configure".`, { cause: err });
  }
  const object = z.record(z.unknown()).safeParse(parsed);
  if (!object.success) {
    throw new Error(`Config file at ${file} must contain a JSON object.`);
  }
  return object.data;
}

function envOverrides(): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (process.env.WARDEN_API_URL) overrides.apiUrl = process.env.WARDEN_API_URL;
  if (process.env.WARDEN_API_TOKEN) overrides.apiToken = process.env.WARDEN_API_TOKEN;
  if (process.env.WARDEN_TELEMETRY_URL) overrides.telemetryUrl = process.env.WARDEN_TELEMETRY_URL;
  if (process.env.WARDEN_TELEMETRY_DISABLE) overrides.telemetry = false;
  if (process.env.WARDEN_LOG_LEVEL) overrides.logLevel = process.env.WARDEN_LOG_LEVEL;
  return overrides;
}

function parseConfig(raw: Record<string, unknown>, source: string): WardenConfig {
  const result = WardenConfig.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config (${source}): ${issues}`);
  }
  return result.data;
}

/** Config as stored on disk, without environment overrides */
export function loadStoredConfig(): WardenConfig {
  const file = getConfigPath();
  return parseConfig(readConfigFile(file), file);
}

/** Effective config: the file, then WARDEN_* environment variables on top */
export function loadConfig(): WardenConfig {
  const file = getConfigPath();
  return parseConfig({ ...readConfigFile(file), ...envOverrides() }, `${file} + environment`);
}

/** Validate and write the config file (owner-only, it holds the API token) */
export function saveConfig(config: WardenConfig): void {
  const valid = parseConfig(config, 'new values');
  fs.mkdirSync(getConfigDir(), { recursive: true });
  fs.writeFileSync(getConfigPath(), `${JSON.stringify(valid, null, 2)}\n`, { encoding: 'utf-8', mode: 0o600 });
}

#!/usr/bin/env node

import { cmdConfigure } from './commands/configure.js';
import { cmdGeneratePkgManifest, cmdScanPkgManifest, createDefaultDeps } from './commands/vulnerability.js';
import { loadConfig } from './config.js';
import { logger } from './logger.js';
import { VERSION } from './version.js';

const args = process.argv.slice(2);
const command = args[0];

function hasFlag(flag: string): boolean {
  return args.includes(flag);
}

function getArg(flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

function printUsage(): void {
  console.log('Usage: warden [command]');
  console.log('');
  console.log('Commands:');
  console.log('  vulnerability host generate-pkg-manifest   Print the package manifest of this host');
  console.log('  vulnerability host scan-pkg-manifest       Submit a package manifest for assessment');
  console.log('  configure                                  Store API access settings');
  console.log('  version                                    Print the CLI version');
  console.log('');
  console.log('Scan options:');
  console.log('  --local                  Generate the manifest from this host');
  console.log('  --pkg-manifest <file>    Submit a previously generated manifest');
  console.log('');
  console.log('Configure options:');
  console.log('  --url <url>      API base URL');
  console.log('  --token <token>  API token');
  console.log('');
  console.log('Environment:');
  console.log('  WARDEN_HOME, WARDEN_API_URL, WARDEN_API_TOKEN, WARDEN_LOG_LEVEL,');
  console.log('  WARDEN_TELEMETRY_URL, WARDEN_TELEMETRY_DISABLE');
}

async function cmdVulnerability(): Promise<void> {
  const [, target, subcommand] = args;
  if (target !== 'host') {
    printUsage();
    process.exit(1);
  }

  const config = loadConfig();
  if (config.logLevel) {
    logger.level = config.logLevel;
  }
  const deps = createDefaultDeps(config);

  switch (subcommand) {
    case 'generate-pkg-manifest':
      await cmdGeneratePkgManifest(deps);
      break;
    case 'scan-pkg-manifest':
      await cmdScanPkgManifest({ local: hasFlag('--local'), manifestFile: getArg('--pkg-manifest') }, deps);
      break;
    default:
      printUsage();
      process.exit(1);
  }
}

async function main(): Promise<void> {
  switch (command) {
    case 'vulnerability':
    case 'vuln':
      await cmdVulnerability();
      break;
    case 'configure':
      cmdConfigure({ apiUrl: getArg('--url'), apiToken: getArg('--token') });
      break;
    case 'version':
    case '--version':
      console.log(VERSION);
      break;
    case undefined:
    case 'help':
    case '--help':
      printUsage();
      break;
    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  logger.debug({ err }, 'command failed');
  console.error(`Error: ${message}`);
  process.exit(1);
});

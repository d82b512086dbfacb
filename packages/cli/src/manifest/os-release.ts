import { readFileSync } from 'node:fs';
import { ManifestError, ManifestErrorCode, OS_RELEASE_FILE, type OsInfo } from '@warden/shared';
import { logger } from '../logger.js';

const ID_PATTERN = /^ID=(.*)$/;
const VERSION_ID_PATTERN = /^VERSION_ID=(.*)$/;

const UNSUPPORTED_PLATFORM_MESSAGE = `unsupported platform

Package manifests can only be generated on Linux hosts that ship ${OS_RELEASE_FILE}.
Check the host vulnerability assessment documentation for the list of supported platforms.`;

function stripQuotes(value: string): string {
  return value.replace(/^"+|"+$/g, '');
}

/**
 * Extract `ID` and `VERSION_ID` from os-release content.
 * Missing keys are left empty.
 */
export function parseOsRelease(content: string): OsInfo {
  const info: OsInfo = { name: '', version: '' };

  for (const line of content.split(/\r?\n/)) {
    const id = ID_PATTERN.exec(line);
    if (id) {
      info.name = stripQuotes(id[1] ?? '');
      continue;
    }
    const versionId = VERSION_ID_PATTERN.exec(line);
    if (versionId) {
      info.version = stripQuotes(versionId[1] ?? '');
    }
  }

  return info;
}

export function readOsInfo(file: string = OS_RELEASE_FILE): OsInfo {
  logger.debug({ os: process.platform, arch: process.arch }, 'detecting operating system information');

  let content: string;
  try {
    content = readFileSync(file, 'utf-8');
  } catch (err) {
    throw new ManifestError(ManifestErrorCode.UNSUPPORTED_PLATFORM, UNSUPPORTED_PLATFORM_MESSAGE, {
      cause: err,
    });
  }

  logger.debug({ file }, 'parsing os release file');
  return parseOsRelease(content);
}

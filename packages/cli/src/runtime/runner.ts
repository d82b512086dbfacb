import { execFile } from 'node:child_process';
import type { CommandRunner } from '@warden/managers';

// Package listings on large hosts run to several megabytes.
const MAX_BUFFER = 64 * 1024 * 1024;

/** Default runner that shells out to real commands */
export const defaultRunner: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    execFile(command, args, { encoding: 'utf-8', maxBuffer: MAX_BUFFER }, (error, stdout, stderr) => {
      if (!error) {
        resolve({ stdout, stderr, exitCode: 0 });
        return;
      }
      if (typeof error.code === 'number') {
        resolve({ stdout, stderr, exitCode: error.code });
        return;
      }
      if (error.signal) {
        resolve({ stdout, stderr, exitCode: null, signal: error.signal });
        return;
      }
      reject(error);
    });
  });

import { pino } from 'pino';

/**
 * Diagnostics go to stderr so stdout stays machine-readable.
 * Starts at `warn`; commands raise or lower it from the validated config
 * (`WARDEN_LOG_LEVEL` included).
 */
export const logger = pino(
  {
    name: 'warden',
    level: 'warn',
  },
  process.stderr,
);

import { logger } from '../logger.js';
import type { TelemetryEvent } from './event.js';

const SEND_TIMEOUT_MS = 5_000;

export interface TelemetrySink {
  /** Resolves once the event is delivered or given up on; never rejects */
  send(event: TelemetryEvent): Promise<void>;
}

export const noopTelemetrySink: TelemetrySink = {
  async send() {},
};

/** Posts events as JSON; delivery failures are logged, not thrown */
export function createHttpTelemetrySink(url: string): TelemetrySink {
  return {
    async send(event) {
      await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(event),
        signal: AbortSignal.timeout(SEND_TIMEOUT_MS),
      })
        .then((res) => {
          if (!res.ok) {
            logger.debug({ status: res.status, feature: event.feature }, 'telemetry event rejected');
          }
        })
        .catch((err: unknown) => {
          logger.debug({ err, feature: event.feature }, 'unable to send telemetry event');
        });
    },
  };
}

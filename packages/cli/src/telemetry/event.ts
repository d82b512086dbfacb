import { VERSION } from '../version.js';

export type FieldValue = string | number | boolean;

/**
 * Usage event for one CLI feature run. Fields are collected while the
 * feature runs; the caller decides when (and whether) to send it.
 */
export class TelemetryEvent {
  readonly feature: string;
  readonly featureData: Record<string, FieldValue> = {};
  durationMs = 0;
  error?: string;

  constructor(feature: string) {
    this.feature = feature;
  }

  addFeatureField(key: string, value: FieldValue): void {
    this.featureData[key] = value;
  }

  toJSON(): Record<string, unknown> {
    return {
      feature: this.feature,
      feature_data: this.featureData,
      duration_ms: this.durationMs,
      error: this.error,
      version: VERSION,
      os: process.platform,
      arch: process.arch,
    };
  }
}

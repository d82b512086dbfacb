import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadStoredConfig } from '../config.js';
import { cmdConfigure } from './configure.js';

describe('cmdConfigure', () => {
  const originalEnv = process.env;
  let home: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'warden-configure-'));
    process.env = { ...originalEnv, WARDEN_HOME: home };
  });

  afterEach(() => {
    process.env = originalEnv;
    fs.rmSync(home, { recursive: true, force: true });
  });

  it('writes the URL and token', () => {
    const log = vi.fn();

    cmdConfigure({ apiUrl: 'https://acme.example.test', apiToken: 'test-token' }, log);

    expect(loadStoredConfig()).toEqual({ apiUrl: 'https://acme.example.test', apiToken: 'test-token', telemetry: true });
    expect(log).toHaveBeenCalledWith(`Configuration saved to ${path.join(home, 'config.json')}`);
  });

  it('keeps existing values it was not given', () => {
    cmdConfigure({ apiUrl: 'https://acme.example.test', apiToken: 'first-token' }, vi.fn());
    cmdConfigure({ apiToken: 'second-token' }, vi.fn());

    expect(loadStoredConfig()).toMatchObject({ apiUrl: 'https://acme.example.test', apiToken: 'second-token' });
  });

  it('rejects an invalid URL without writing', () => {
    expect(() => cmdConfigure({ apiUrl: 'acme' }, vi.fn())).toThrow(/apiUrl: Invalid url/);
    expect(fs.existsSync(path.join(home, 'config.json'))).toBe(false);
  });

  it('requires at least one value', () => {
    expect(() => cmdConfigure({}, vi.fn())).toThrow('Nothing to configure');
  });
});

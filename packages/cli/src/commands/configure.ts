import { getConfigPath, loadStoredConfig, saveConfig } from '../config.js';

export interface ConfigureOptions {
  apiUrl?: string;
  apiToken?: string;
}

/** Merge the given values into the stored config and write it back */
export function cmdConfigure(options: ConfigureOptions, log: (msg: string) => void = console.log): void {
  if (!options.apiUrl && !options.apiToken) {
    throw new Error('Nothing to configure: pass --url <url> and/or --token <token>');
  }

  const config = loadStoredConfig();
  if (options.apiUrl) config.apiUrl = options.apiUrl;
  if (options.apiToken) config.apiToken = options.apiToken;
  saveConfig(config);

  log(`Configuration saved to ${getConfigPath()}`);
}

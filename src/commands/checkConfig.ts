/**
 * check-config command: load a configuration the way the orchestrator would
 * and print the effective settings.
 */

import { ConfigurationLoader, defaultConfigurationLoader } from '../config/loader';
import { ResolvedConfiguration } from '../config/configuration';
import { ui } from '../utils/ui';

export interface CheckConfigCommandOptions {
  file?: string;
  json?: boolean;
  env?: NodeJS.ProcessEnv;
  loader?: ConfigurationLoader;
}

export function formatConfiguration(settings: ResolvedConfiguration): string[] {
  const entries = Object.entries(settings);
  const width = Math.max(...entries.map(([key]) => key.length));
  return entries.map(([key, value]) => `${key.padEnd(width)}  ${String(value)}`);
}

/**
 * @throws ConfigError when the configuration cannot be loaded
 */
export function executeCheckConfigCommand(options: CheckConfigCommandOptions = {}): ResolvedConfiguration {
  const loader = options.loader ?? defaultConfigurationLoader;
  const configuration = loader.load({
    ...(options.file !== undefined ? { filePath: options.file } : {}),
    ...(options.env !== undefined ? { env: options.env } : {}),
  });
  const settings = configuration.toJSON();
  ui.debug(`Loaded configuration from ${options.file ?? 'defaults and environment'}`);

  if (options.json) {
    ui.info(JSON.stringify(settings, null, 2));
    return settings;
  }

  for (const line of formatConfiguration(settings)) {
    ui.info(line);
  }
  ui.success('Configuration is valid');
  return settings;
}

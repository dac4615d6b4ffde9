/**
 * Adapter Factory
 *
 * Creates and configures game source adapters from datasources.yml.
 */

import yaml from 'js-yaml';
import fs from 'fs';
import path from 'path';
import { AdapterConfig, DataSourcesConfig, GameSourceAdapter } from './GameSourceAdapter';
import { FileGameSource } from './FileGameSource';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(config: Record<string, unknown>, key: string, adapterName: string): string {
  const value = config[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`Adapter '${adapterName}' is missing config.${key}`);
  }
  return value;
}

/**
 * Validate the parsed YAML into a DataSourcesConfig
 */
export function parseDataSourcesConfig(content: string): DataSourcesConfig {
  const loaded: unknown = yaml.load(content);

  if (!isRecord(loaded) || !isRecord(loaded.adapters)) {
    throw new Error('datasources config must define an "adapters" mapping');
  }

  const adapters: Record<string, AdapterConfig> = {};
  for (const [name, raw] of Object.entries(loaded.adapters)) {
    if (!isRecord(raw) || typeof raw.provider !== 'string') {
      throw new Error(`Adapter '${name}' must define a provider`);
    }
    adapters[name] = {
      provider: raw.provider,
      enabled: raw.enabled !== false,
      config: isRecord(raw.config) ? raw.config : {},
    };
  }

  const defaultAdapter = typeof loaded.defaultAdapter === 'string'
    ? loaded.defaultAdapter
    : Object.keys(adapters)[0];

  if (!defaultAdapter) {
    throw new Error('datasources config does not define any adapters');
  }

  return { adapters, defaultAdapter };
}

export class AdapterFactory {
  private config: DataSourcesConfig;
  private baseDir: string;

  constructor(configPath: string = path.join(__dirname, '../datasources.yml')) {
    const configFile = fs.readFileSync(configPath, 'utf8');
    this.config = parseDataSourcesConfig(configFile);
    this.baseDir = path.dirname(configPath);
  }

  /**
   * Create an adapter by name
   */
  createAdapter(adapterName?: string): GameSourceAdapter {
    const name = adapterName || this.config.defaultAdapter;
    const adapterConfig = this.config.adapters[name];

    if (!adapterConfig) {
      throw new Error(`Adapter '${name}' not found in configuration`);
    }

    if (!adapterConfig.enabled) {
      throw new Error(`Adapter '${name}' is disabled`);
    }

    switch (adapterConfig.provider) {
      case 'file':
        return new FileGameSource({
          // Relative data paths resolve against the config file's directory
          dataPath: path.resolve(this.baseDir, requireString(adapterConfig.config, 'dataPath', name)),
          fileFormat: requireString(adapterConfig.config, 'fileFormat', name),
        });

      default:
        throw new Error(`Unknown adapter provider: ${adapterConfig.provider}`);
    }
  }

  /**
   * Get list of enabled adapters
   */
  getAvailableAdapters(): string[] {
    return Object.keys(this.config.adapters).filter(
      name => this.config.adapters[name].enabled
    );
  }
}

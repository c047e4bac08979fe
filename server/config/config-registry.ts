/**
 * Configuration Registry
 *
 * Loads the API settings file once and hands out validated settings.
 * - YAML file, validated against ApiSettingsSchema
 * - Built-in defaults when the file is missing or invalid
 * - Environment overrides applied last
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { ApiSettings, DEFAULT_API_SETTINGS, validateApiSettings } from './config-schema.js';
import type { AppConfig } from './app-config.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('ConfigRegistry');

export type SettingsSource = 'file' | 'defaults';

export class ConfigRegistry {
  private static instance: ConfigRegistry;
  private settings: ApiSettings = DEFAULT_API_SETTINGS;
  private source: SettingsSource = 'defaults';
  private initialized = false;

  static getInstance(): ConfigRegistry {
    if (!ConfigRegistry.instance) {
      ConfigRegistry.instance = new ConfigRegistry();
    }
    return ConfigRegistry.instance;
  }

  /**
   * Load settings from disk. Safe to call more than once.
   */
  async initialize(config: Pick<AppConfig, 'API_SETTINGS_PATH' | 'LAND_PRICE_API_ENABLED'>): Promise<void> {
    if (this.initialized) return;

    const filePath = config.API_SETTINGS_PATH ?? path.join(process.cwd(), 'config', 'api-settings.yaml');
    const loaded = await loadSettingsFile(filePath);
    this.settings = loaded.settings;
    this.source = loaded.source;

    if (config.LAND_PRICE_API_ENABLED !== undefined) {
      this.settings = withLandPriceApiEnabled(this.settings, config.LAND_PRICE_API_ENABLED);
    }

    this.initialized = true;
    log.info(`✅ Settings ready (source: ${this.source}, land price API ${this.settings.dataSources.landPriceApi.enabled ? 'enabled' : 'disabled'})`);
  }

  getSettings(): ApiSettings {
    return this.settings;
  }

  getSource(): SettingsSource {
    return this.source;
  }
}

export async function loadSettingsFile(filePath: string): Promise<{ settings: ApiSettings; source: SettingsSource }> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch {
    log.warn(`⚠️ No settings file at ${filePath}, using built-in defaults`);
    return { settings: DEFAULT_API_SETTINGS, source: 'defaults' };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    log.warn(`⚠️ Settings file ${filePath} is not valid YAML, using built-in defaults:`, error);
    return { settings: DEFAULT_API_SETTINGS, source: 'defaults' };
  }

  const validation = validateApiSettings(parsed);
  if (!validation.success) {
    log.warn(`⚠️ Settings file ${filePath} rejected, using built-in defaults: ${validation.error}`);
    return { settings: DEFAULT_API_SETTINGS, source: 'defaults' };
  }

  log.info(`📦 Loaded settings from ${filePath}`);
  return { settings: validation.data, source: 'file' };
}

function withLandPriceApiEnabled(settings: ApiSettings, enabled: boolean): ApiSettings {
  return {
    ...settings,
    dataSources: {
      ...settings.dataSources,
      landPriceApi: { ...settings.dataSources.landPriceApi, enabled }
    }
  };
}

export const configRegistry = ConfigRegistry.getInstance();

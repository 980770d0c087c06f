import { promises as fs } from 'fs';
import * as os from 'os';
import { extname, join } from 'path';
import { CONFIG_FILE_NAMES, DIR_PATTERNS } from '../constants/index.js';
import { PRESERVE_MODES, type ForkferryConfig, type ForkferryDirectories, type PreserveMode } from '../types/index.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { readJsoncObject } from '../utils/jsonc.js';
import { logger } from '../utils/logger.js';

/**
 * Configuration management for forkferry
 * Supports both JSON and JSONC formats
 */

const DEFAULT_CONFIG_FILE = 'config.jsonc';

export const DEFAULT_CONFIG: Readonly<ForkferryConfig> = {
  preserve: 'naps',
  parseADF: true,
  parseAS: true,
  parseNAPS: true,
  checkNamed: false,
  recurse: true,
  stripExt: true,
  stripPaths: false,
  macZip: true,
  convertDOSText: false,
  napsExtension: false,
  compress: true
};

export type ConfigKey = keyof ForkferryConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'preserve',
  'parseADF',
  'parseAS',
  'parseNAPS',
  'checkNamed',
  'recurse',
  'stripExt',
  'stripPaths',
  'macZip',
  'convertDOSText',
  'napsExtension',
  'compress'
];

/**
 * `~/.forkferry`, or `$FORKFERRY_HOME` when set.
 */
export function getForkferryDirectories(): ForkferryDirectories {
  const override = process.env.FORKFERRY_HOME;
  return {
    config: override && override.length > 0 ? override : join(os.homedir(), DIR_PATTERNS.FORKFERRY)
  };
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some(known => known === key);
}

function isPreserveMode(value: unknown): value is PreserveMode {
  return typeof value === 'string' && PRESERVE_MODES.some(mode => mode === value);
}

/**
 * Checks one setting, throwing ConfigError when the value does not fit.
 */
export function validateConfigValue<K extends ConfigKey>(key: K, value: unknown): ForkferryConfig[K];
export function validateConfigValue(key: ConfigKey, value: unknown): ForkferryConfig[ConfigKey] {
  if (key === 'preserve') {
    if (!isPreserveMode(value)) {
      throw new ConfigError(`Invalid value for preserve: ${String(value)} (expected one of ${PRESERVE_MODES.join(', ')})`);
    }
    return value;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigError(`Invalid value for ${key}: ${String(value)} (expected true or false)`);
  }
  return value;
}

/**
 * Parses a setting typed on the command line.
 */
export function parseConfigValue(key: string, raw: string): { key: ConfigKey; value: ForkferryConfig[ConfigKey] } {
  if (!isConfigKey(key)) {
    throw new ConfigError(`Unknown setting: ${key} (known: ${CONFIG_KEYS.join(', ')})`);
  }
  if (key === 'preserve') {
    return { key, value: validateConfigValue(key, raw.toLowerCase()) };
  }
  const lowered = raw.toLowerCase();
  const value = lowered === 'true' || lowered === 'on' || lowered === 'yes'
    ? true
    : lowered === 'false' || lowered === 'off' || lowered === 'no'
      ? false
      : raw;
  return { key, value: validateConfigValue(key, value) };
}

function mergeConfig(fileConfig: Record<string, unknown>, source: string): ForkferryConfig {
  const config: ForkferryConfig = { ...DEFAULT_CONFIG };
  for (const [key, value] of Object.entries(fileConfig)) {
    if (!isConfigKey(key)) {
      logger.warn(`Ignoring unknown setting '${key}' in ${source}`);
      continue;
    }
    setValue(config, key, value);
  }
  return config;
}

function setValue<K extends ConfigKey>(config: ForkferryConfig, key: K, value: unknown): void {
  config[key] = validateConfigValue(key, value);
}

class ConfigManager {
  private config: ForkferryConfig | null = null;
  private configPath: string | null = null;
  private readonly dirs: ForkferryDirectories;

  constructor(dirs: ForkferryDirectories = getForkferryDirectories()) {
    this.dirs = dirs;
  }

  /**
   * Find the existing config file (supports both .json and .jsonc)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const candidate = join(this.dirs.config, fileName);
      try {
        await fs.access(candidate);
        return candidate;
      } catch {
        continue;
      }
    }
    return null;
  }

  private async getConfigPath(): Promise<string> {
    if (this.configPath) {
      return this.configPath;
    }
    this.configPath = (await this.findConfigFile()) ?? join(this.dirs.config, DEFAULT_CONFIG_FILE);
    return this.configPath;
  }

  /**
   * Load configuration from file; built-in defaults fill in what the file
   * leaves out. A missing file is not created until something is saved.
   */
  async load(): Promise<ForkferryConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = { ...DEFAULT_CONFIG };
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    let fileConfig: Record<string, unknown> | undefined;
    try {
      fileConfig = readJsoncObject(configPath);
    } catch (error) {
      throw new ConfigError(`Failed to load configuration: ${errorMessage(error)}`, { configPath });
    }
    this.configPath = configPath;
    this.config = mergeConfig(fileConfig ?? {}, configPath);
    return this.config;
  }

  /**
   * Save current configuration to file
   */
  async save(): Promise<void> {
    if (!this.config) {
      throw new ConfigError('No configuration loaded to save');
    }
    const configPath = await this.getConfigPath();
    try {
      await fs.mkdir(this.dirs.config, { recursive: true });
      let content = JSON.stringify(this.config, null, 2) + '\n';
      if (extname(configPath) === '.jsonc') {
        content = '// forkferry defaults; command-line flags override these\n' + content;
      }
      logger.debug(`Saving config to: ${configPath}`);
      await fs.writeFile(configPath, content, 'utf-8');
    } catch (error) {
      logger.error('Failed to save configuration', { error, configPath });
      throw new ConfigError(`Failed to save configuration: ${errorMessage(error)}`, { configPath });
    }
  }

  async get<K extends ConfigKey>(key: K): Promise<ForkferryConfig[K]> {
    const config = await this.load();
    return config[key];
  }

  async set<K extends ConfigKey>(key: K, value: ForkferryConfig[K]): Promise<void> {
    const config = await this.load();
    config[key] = validateConfigValue(key, value);
    await this.save();
    logger.info(`Configuration updated: ${key} = ${String(value)}`);
  }

  /** Sets a value typed on the command line. */
  async setFromString(key: string, raw: string): Promise<{ key: ConfigKey; value: ForkferryConfig[ConfigKey] }> {
    const parsed = parseConfigValue(key, raw);
    const config = await this.load();
    setValue(config, parsed.key, parsed.value);
    await this.save();
    logger.info(`Configuration updated: ${parsed.key} = ${String(parsed.value)}`);
    return parsed;
  }

  async getAll(): Promise<ForkferryConfig> {
    return { ...(await this.load()) };
  }

  async reset(): Promise<void> {
    this.config = { ...DEFAULT_CONFIG };
    await this.save();
    logger.info('Configuration reset to defaults');
  }

  async getConfigFilePath(): Promise<string> {
    return this.getConfigPath();
  }

  getDirectories(): ForkferryDirectories {
    return this.dirs;
  }
}

// Create and export a singleton instance
export const configManager = new ConfigManager();

// Export the class for testing purposes
export { ConfigManager };

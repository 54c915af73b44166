import Ajv from 'ajv';
import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import type { LogLevel } from './logger';
import { ConfigurationError } from './error-boundary';
import { ensureParentDir, errorMessage, isErrnoException } from './utils';

export interface ViewerConfig {
  rootPath: string;
  title: string;
  sidebarWidth: number;
  showHidden: boolean;
  ignore: string[];
  chordTimeoutMs: number;
  logging: {
    enabled: boolean;
    level: LogLevel;
    filePath: string;
  };
}

const configSchema = {
  type: 'object',
  properties: {
    rootPath: { type: 'string', minLength: 1 },
    title: { type: 'string' },
    sidebarWidth: { type: 'number', minimum: 10, maximum: 90 },
    showHidden: { type: 'boolean' },
    ignore: { type: 'array', items: { type: 'string' } },
    chordTimeoutMs: { type: 'number', minimum: 0 },
    logging: {
      type: 'object',
      properties: {
        enabled: { type: 'boolean' },
        level: { type: 'string', enum: ['debug', 'info', 'warn', 'error'] },
        filePath: { type: 'string', minLength: 1 }
      },
      required: ['enabled', 'level', 'filePath'],
      additionalProperties: false
    }
  },
  required: ['rootPath', 'title', 'sidebarWidth', 'showHidden', 'ignore', 'chordTimeoutMs', 'logging'],
  additionalProperties: false
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private static ajv = new Ajv({ allErrors: true });
  private static validate = ConfigManager.ajv.compile<ViewerConfig>(configSchema);

  static getConfigPath(): string {
    const homeDir = process.env.HOME || process.env.USERPROFILE || '.';
    return join(homeDir, '.splitview', 'config.json');
  }

  static getDefaultConfig(): ViewerConfig {
    return {
      rootPath: 'assets',
      title: 'Split Viewer',
      sidebarWidth: 30,
      showHidden: false,
      ignore: ['__pycache__'],
      chordTimeoutMs: 1000,
      logging: {
        enabled: true,
        level: 'debug',
        filePath: 'viewer_debug.log'
      }
    };
  }

  /**
   * Merge a partial config file over the defaults and validate the result
   */
  static parse(data: unknown): ViewerConfig {
    if (!isRecord(data)) {
      throw new ConfigurationError('Invalid configuration: expected a JSON object');
    }

    const defaults = this.getDefaultConfig();
    const merged: Record<string, unknown> = {
      ...defaults,
      ...data,
      logging: isRecord(data.logging) ? { ...defaults.logging, ...data.logging } : data.logging ?? defaults.logging
    };

    if (!this.validate(merged)) {
      throw new ConfigurationError(`Invalid configuration: ${this.ajv.errorsText(this.validate.errors)}`);
    }

    return merged;
  }

  static async load(configPath: string = this.getConfigPath()): Promise<ViewerConfig> {
    try {
      let raw: string;
      try {
        raw = await readFile(configPath, 'utf8');
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          const defaultConfig = this.getDefaultConfig();
          await this.save(defaultConfig, configPath);
          return defaultConfig;
        }
        throw error;
      }

      return this.parse(JSON.parse(raw));
    } catch (error) {
      console.warn(`Failed to load config from ${configPath}: ${errorMessage(error)}`);
      return this.getDefaultConfig();
    }
  }

  static async save(config: ViewerConfig, configPath: string = this.getConfigPath()): Promise<void> {
    if (!this.validate(config)) {
      throw new ConfigurationError(`Invalid configuration: ${this.ajv.errorsText(this.validate.errors)}`);
    }

    await ensureParentDir(configPath);
    await writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf8');
  }

  static async get<K extends keyof ViewerConfig>(key: K, configPath?: string): Promise<ViewerConfig[K]> {
    const config = await this.load(configPath);
    return config[key];
  }

  static async set<K extends keyof ViewerConfig>(key: K, value: ViewerConfig[K], configPath?: string): Promise<void> {
    const config = await this.load(configPath);
    config[key] = value;
    await this.save(config, configPath);
  }
}

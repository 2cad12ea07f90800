import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import chalk from 'chalk';
import { AutopushConfigSchema, NUMERIC_CONFIG_KEYS, type ConfigKey } from './schemas/validation.js';
import type { AutopushConfig } from './types/common.js';
import { sanitizeError } from './utils/security.js';
import { ErrorType } from './types/error-handler.js';
import { SecureError } from './utils/error-handler.js';
import {
  CONFIG_DIR as CONFIG_DIR_NAME,
  CONFIG_FILE as CONFIG_FILE_NAME,
  CONFIG_FILE_MODE,
  CONFIG_DIR_MODE,
  DEFAULT_CONFIG,
} from './constants/config.js';

export class ConfigManager {
  private static instance: ConfigManager;
  private config: AutopushConfig;
  readonly configDir: string;
  readonly configFile: string;

  constructor(configDir: string = path.join(os.homedir(), CONFIG_DIR_NAME)) {
    this.configDir = configDir;
    this.configFile = path.join(configDir, CONFIG_FILE_NAME);
    this.config = this.loadConfig();
  }

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private readonly loadConfig = (): AutopushConfig => {
    try {
      if (fs.existsSync(this.configFile)) {
        const userConfig: unknown = JSON.parse(fs.readFileSync(this.configFile, 'utf-8'));

        const result = AutopushConfigSchema.safeParse(userConfig);
        if (result.success) {
          return result.data;
        }
        console.warn(
          chalk.yellow('Invalid config data, using defaults:'),
          result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ')
        );
      }
    } catch (error) {
      console.warn(chalk.yellow('Failed to load config, using defaults:'), sanitizeError(error));
    }

    return { ...DEFAULT_CONFIG };
  };

  private readonly writeConfig = (): void => {
    if (!fs.existsSync(this.configDir)) {
      fs.mkdirSync(this.configDir, { recursive: true, mode: CONFIG_DIR_MODE });
    }
    fs.writeFileSync(this.configFile, JSON.stringify(this.config, null, 2), { mode: CONFIG_FILE_MODE });
  };

  public getConfig = (): AutopushConfig => ({ ...this.config });

  public get = <K extends ConfigKey>(key: K): AutopushConfig[K] => this.config[key];

  public set = (key: ConfigKey, value: unknown): void => {
    const result = AutopushConfigSchema.safeParse({ ...this.config, [key]: value });

    if (!result.success) {
      throw new SecureError(
        `Invalid value for ${key}: ${result.error.issues.map((e) => e.message).join(', ')}`,
        ErrorType.VALIDATION_ERROR,
        { operation: 'setConfig', key },
        true
      );
    }

    this.config = result.data;
    this.writeConfig();
  };

  public reset = (): void => {
    this.config = { ...DEFAULT_CONFIG };
    this.writeConfig();
  };
}

export interface StatePaths {
  stateDir: string;
  logFile: string;
  errorDir: string;
  versionFile: string;
}

/**
 * Absolute locations of the files autopush keeps for a checkout. They live
 * in the git directory, which is not `<root>/.git` in linked worktrees and
 * submodules.
 */
export const resolveStatePaths = (config: AutopushConfig, gitDir: string): StatePaths => {
  const stateDir = path.resolve(gitDir, config.stateDir);
  return {
    stateDir,
    logFile: path.join(stateDir, config.logFile),
    errorDir: path.join(stateDir, config.errorDir),
    versionFile: path.join(stateDir, config.versionFile),
  };
};

/**
 * Values typed on the command line arrive as text. Only numeric keys are
 * converted; text that is not a number is left for validation to reject.
 */
export const parseConfigValue = (key: ConfigKey, value: string): string | number => {
  const numeric = NUMERIC_CONFIG_KEYS.some((k) => k === key);
  if (!numeric || value.trim() === '') {
    return value;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? value : parsed;
};

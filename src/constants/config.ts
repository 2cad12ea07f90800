import type { AutopushConfig } from '../types/common.js';
import { GIT_DEFAULT_REMOTE } from './git.js';

export const CONFIG_DIR = '.autopush';
export const CONFIG_FILE = 'config.json';
export const CONFIG_FILE_MODE = 0o600;
export const CONFIG_DIR_MODE = 0o700;

// Edit this to change what a plain `autopush` run commits with.
export const DEFAULT_COMMIT_MESSAGE = 'Update project files';

export const DEFAULT_CONFIG: AutopushConfig = {
  message: DEFAULT_COMMIT_MESSAGE,
  remote: GIT_DEFAULT_REMOTE,
  initialInterval: 60,
  normalInterval: 300,
  initialChecks: 3,
  maxRetries: 3,
  probeTimeout: 10,
  maxLogLines: 2000,
  logRotationSize: 1000,
  stateDir: 'autopush',
  logFile: 'autopush.log',
  errorDir: 'errors',
  versionFile: 'version',
  initialVersion: '1.1.3',
};

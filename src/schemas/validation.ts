import { z } from 'zod';
import type { SetRequired } from 'type-fest';
import type { AutopushConfig } from '../types/common.js';
import { DEFAULT_CONFIG } from '../constants/config.js';
import { VERSION_PATTERN } from '../constants/versioning.js';

const seconds = z.number().int().positive('Interval must be a positive number of seconds');
const lineCount = z.number().int().positive('Line counts must be positive');
const relativePath = z
  .string()
  .min(1, 'Path is required')
  .refine((value) => !value.split(/[\\/]/).includes('..'), 'Path must not leave the git directory');

export const VersionSchema = z
  .string()
  .trim()
  .regex(VERSION_PATTERN, 'Version must look like MAJOR.MINOR.PATCH');

// The commit message is taken as is: any string git accepts.
export const CommitMessageSchema = z.string();

export const AutopushConfigSchema = z
  .object({
    message: CommitMessageSchema.default(DEFAULT_CONFIG.message),
    remote: z.string().min(1).default(DEFAULT_CONFIG.remote),
    branch: z.string().min(1).optional(),
    initialInterval: seconds.default(DEFAULT_CONFIG.initialInterval),
    normalInterval: seconds.default(DEFAULT_CONFIG.normalInterval),
    initialChecks: z.number().int().min(0).default(DEFAULT_CONFIG.initialChecks),
    maxRetries: z.number().int().min(1).default(DEFAULT_CONFIG.maxRetries),
    probeTimeout: seconds.default(DEFAULT_CONFIG.probeTimeout),
    maxLogLines: lineCount.default(DEFAULT_CONFIG.maxLogLines),
    logRotationSize: lineCount.default(DEFAULT_CONFIG.logRotationSize),
    stateDir: relativePath.default(DEFAULT_CONFIG.stateDir),
    logFile: relativePath.default(DEFAULT_CONFIG.logFile),
    errorDir: relativePath.default(DEFAULT_CONFIG.errorDir),
    versionFile: relativePath.default(DEFAULT_CONFIG.versionFile),
    initialVersion: VersionSchema.default(DEFAULT_CONFIG.initialVersion),
  })
  .refine((config) => config.logRotationSize < config.maxLogLines, {
    message: 'logRotationSize must be smaller than maxLogLines',
    path: ['logRotationSize'],
  });

export const CONFIG_KEYS = [
  'message',
  'remote',
  'branch',
  'initialInterval',
  'normalInterval',
  'initialChecks',
  'maxRetries',
  'probeTimeout',
  'maxLogLines',
  'logRotationSize',
  'stateDir',
  'logFile',
  'errorDir',
  'versionFile',
  'initialVersion',
] as const satisfies ReadonlyArray<keyof AutopushConfig>;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

// Keys whose command-line text is converted to a number; the rest are stored as typed.
export const NUMERIC_CONFIG_KEYS = [
  'initialInterval',
  'normalInterval',
  'initialChecks',
  'maxRetries',
  'probeTimeout',
  'maxLogLines',
  'logRotationSize',
] as const satisfies ReadonlyArray<ConfigKey>;

export const isConfigKey = (key: string): key is ConfigKey => CONFIG_KEYS.some((k) => k === key);

// Once the branch has been resolved for a run it is always present.
export type ResolvedConfig = SetRequired<AutopushConfig, 'branch'>;

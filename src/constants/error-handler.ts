import { ErrorType } from '../types/error-handler.js';

export const ERROR_LOG_LIMIT = 100;

export const ERROR_PATTERNS = [
  { type: ErrorType.TIMEOUT_ERROR, patterns: ['timeout', 'timed out'] },
  { type: ErrorType.NETWORK_ERROR, patterns: ['could not resolve host', 'network', 'connection refused'] },
  { type: ErrorType.VALIDATION_ERROR, patterns: ['validation', 'invalid'] },
  { type: ErrorType.GIT_ERROR, patterns: ['git', 'repository', 'remote', 'rejected'] },
  { type: ErrorType.CONFIG_ERROR, patterns: ['config', 'configuration'] },
];

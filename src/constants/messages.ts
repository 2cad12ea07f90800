// Error messages and user-facing text constants
export const ERROR_MESSAGES = {
  NOT_GIT_REPOSITORY: 'Git directory not found! Please run autopush inside a git repository.',
  INVALID_CONFIG_KEY: 'Invalid configuration key',
  NO_CHANGES_FOUND: 'No changes found',
  EXECUTION_FAILED: 'Error executing git commands',
} as const;

export const SUCCESS_MESSAGES = {
  CONFIGURATION_RESET: 'Configuration reset to defaults',
  OPERATION_COMPLETED: 'Operation completed successfully',
  PUSH_VERIFIED: 'Push verified: Local and remote are synchronized',
} as const;

export const INFO_MESSAGES = {
  BANNER: '=== autopush ===',
  GIT_INFORMATION: 'Git Information:',
  LOG_STATUS: 'Log File Status:',
  VERSION_PROGRESSION: 'Version Progression System:',
  STARTING_LOOP: 'Starting main loop...',
  PENDING_RESUMED: 'Internet connected! Executing pending operations...',
  DRY_RUN: 'Dry run - would run:',
  NO_CHANGES_TO_COMMIT: 'No changes to commit',
} as const;

export const WARNING_MESSAGES = {
  PUSH_MISMATCH: 'Warning: Local and remote differ',
  PUSH_UNVERIFIABLE: 'Could not verify push (no remote commit)',
  RESET_CANCELLED: 'Reset cancelled',
  INTERNET_DOWN: 'All connection methods failed.',
  SUSPENDING: 'Internet disconnected, suspending operations...',
} as const;

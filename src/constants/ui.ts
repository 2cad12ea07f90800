// UI and display constants
export const EXIT_DELAY_MS = 100;

export const LOG_SEPARATOR = '='.repeat(60);
export const NO_INTERNET_SEPARATOR = '-'.repeat(40);
export const BLOCK_SEPARATOR = '='.repeat(80);
export const SECTION_RULE = '-'.repeat(40);
export const SUMMARY_RULE = '─'.repeat(40);

export const SUMMARY_FILES_PER_SECTION = 5;
export const LOG_STATUS_WARN_RATIO = 0.8;
export const LOG_STATUS_EVERY_CHECKS = 10;
export const LOG_TAIL_SCAN_LINES = 10;
export const MESSAGE_PREVIEW_LENGTH = 100;

export const STEP_LABELS = {
  add: 'git add',
  commit: 'git commit',
  push: 'git push',
} as const;

export const SPINNER_MESSAGES = {
  STAGING: 'Running git add ...',
  COMMITTING: 'Running git commit ...',
  PUSHING: 'Running git push ...',
  VERIFYING: 'Verifying push...',
} as const;

/**
 * Git-related constants
 */

export const GIT_DEFAULT_REMOTE = 'origin';
export const GIT_DEFAULT_BRANCH = 'main';
export const GIT_RECENT_COMMITS = 5;
export const GIT_STATUS_RECENT_COMMITS = 3;
export const PUSH_VERIFY_DELAY_MS = 2000;
// simple-git kills a watch-mode command that produces no output for this long.
export const GIT_BLOCK_TIMEOUT_MS = 120_000;

export { PushRunner, terminalReporter, silentReporter, failedStep } from './core/push-runner.js';
export type { PlannedStep, StepReporter } from './core/push-runner.js';
export { AutoCommitCycle } from './core/auto-commit.js';
export { Watcher, intervalFor } from './core/watcher.js';
export { verifyPush, collectRepoInfo } from './core/inspection.js';
export { GitService } from './services/git.js';
export type { GitClient, GitServiceOptions } from './services/git.js';
export { ConnectivityChecker, httpProbe, dnsProbe } from './services/connectivity.js';
export { RunLog } from './services/run-log.js';
export { VersionStore } from './services/version-store.js';
export { ConfigManager } from './config.js';
export { buildProgram } from './program.js';
export { incrementVersion } from './utils/version.js';
export { buildChangeSummary } from './utils/change-summary.js';
export { SecureError, ErrorHandler } from './utils/error-handler.js';

export type * from './types/common.js';

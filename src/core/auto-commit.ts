import chalk from 'chalk';
import type { GitClient } from '../services/git.js';
import type { RunLog } from '../services/run-log.js';
import type { VersionStore } from '../services/version-store.js';
import type { ResolvedConfig } from '../schemas/validation.js';
import type { CycleResult, PushRunResult, PushStep, PushVerification } from '../types/common.js';
import { ErrorType } from '../types/error-handler.js';
import { ErrorHandler, SecureError } from '../utils/error-handler.js';
import { PushRunner, failedStep, type StepReporter } from './push-runner.js';
import { collectRepoInfo, verifyPush } from './inspection.js';
import { buildChangeSummary } from '../utils/change-summary.js';
import { incrementVersion } from '../utils/version.js';
import { formatShortTimestamp, formatTimestamp } from '../utils/time.js';
import { sleep as defaultSleep } from '../utils/process-utils.js';
import { MESSAGE_PREVIEW_LENGTH, SECTION_RULE, SPINNER_MESSAGES, STEP_LABELS } from '../constants/ui.js';
import { PUSH_VERIFY_DELAY_MS } from '../constants/git.js';
import { ERROR_MESSAGES, INFO_MESSAGES, SUCCESS_MESSAGES, WARNING_MESSAGES } from '../constants/messages.js';

export interface AutoCommitDeps {
  git: GitClient;
  log: RunLog;
  versions: VersionStore;
  config: ResolvedConfig;
  reporter: StepReporter;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  verifyDelayMs?: number;
}

const STEP_TITLES: Record<PushStep, string> = {
  add: '1. GIT ADD',
  commit: '2. GIT COMMIT',
  push: '3. GIT PUSH',
};

/**
 * One watch iteration: commit whatever changed under a new version number,
 * push it to the configured branch, check the remote and write a report to
 * the run log.
 */
export class AutoCommitCycle {
  private version: string;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly deps: AutoCommitDeps) {
    this.version = deps.versions.load().version;
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
  }

  get currentVersion(): string {
    return this.version;
  }

  run = async (): Promise<CycleResult> => {
    const { git, log, config } = this.deps;
    const started = this.now();
    const stamp = formatShortTimestamp(started);

    const report: string[] = [
      `GIT AUTO OPERATION STARTED - Version ${this.version}`,
      `Time: ${formatTimestamp(started)}`,
      '',
    ];

    try {
      const summary = buildChangeSummary(await git.getChangeSet());

      if (summary === null) {
        const message = `${stamp} - ${INFO_MESSAGES.NO_CHANGES_TO_COMMIT}`;
        console.log(message);
        report.push(message);
        log.append(report.join('\n'));
        return { success: true, committed: false, version: this.version };
      }

      const nextVersion = incrementVersion(this.version);
      console.log(chalk.gray(`Version incremented: ${this.version} -> ${nextVersion}`));
      this.version = nextVersion;
      this.deps.versions.save(nextVersion);

      const message = `Version ${nextVersion} - ${stamp}\n${summary}`;
      console.log(chalk.blue(`Committing as version: ${nextVersion}`));

      const runner = new PushRunner(git, this.deps.reporter);
      const result = await runner.run(message, {
        stopOnFailure: true,
        target: { remote: config.remote, branch: config.branch },
      });

      const failed = failedStep(result);
      if (failed) {
        throw new SecureError(
          `Error in ${STEP_LABELS[failed.step]}: ${failed.error ?? 'unknown error'}`,
          ErrorType.GIT_ERROR,
          { operation: 'autoCommit' },
          true
        );
      }

      const commitHash = await git.headCommit(true);
      report.push(...this.describeSteps(result, commitHash));

      console.log(`\n${SPINNER_MESSAGES.VERIFYING}`);
      await this.sleep(this.deps.verifyDelayMs ?? PUSH_VERIFY_DELAY_MS);
      const verification = await verifyPush(git, config.remote, config.branch);

      report.push('4. PUSH VERIFICATION', SECTION_RULE);
      report.push(verification.verified ? '✓ Push verified successfully' : '⚠ Push verification warning');
      if (verification.localCommit) report.push(`Local Commit:  ${verification.localCommit}`);
      if (verification.remoteCommit) {
        report.push(`Remote Commit: ${verification.remoteCommit}`);
        report.push(`Match: ${verification.localCommit === verification.remoteCommit ? 'Yes' : 'No'}`);
      }
      report.push('');
      this.printVerification(verification);

      const info = await collectRepoInfo(git);
      report.push(
        '5. GIT INFORMATION SUMMARY',
        SECTION_RULE,
        `Current Branch: ${info.branch}`,
        `Git User: ${info.user}`,
        ''
      );
      if (info.remotes) report.push('Remote URLs:', info.remotes);
      report.push('', 'Recent Commits (last 5):', info.recentCommits, '');

      report.push(
        'OPERATION COMPLETED SUCCESSFULLY',
        `Version: ${this.version}`,
        `Time: ${formatTimestamp(this.now())}`,
        `Commit: ${commitHash}`
      );
      log.append(report.join('\n'));

      console.log(`${chalk.green(`\n${stamp} - ${SUCCESS_MESSAGES.OPERATION_COMPLETED}`)}
New Version: ${this.version}
Commit: ${commitHash}
Message preview: ${message.slice(0, MESSAGE_PREVIEW_LENGTH)}...
Push verified: ${verification.verified ? 'Yes' : 'Needs attention'}
${chalk.gray(`Logs saved to ${log.file}`)}`);

      return {
        success: true,
        committed: true,
        version: this.version,
        commit: commitHash,
        verified: verification.verified,
      };
    } catch (error) {
      return this.recordFailure(error);
    }
  };

  private readonly describeSteps = (result: PushRunResult, commitHash: string): string[] => {
    const lines: string[] = [];

    for (const outcome of result.steps) {
      lines.push(STEP_TITLES[outcome.step], SECTION_RULE, `✓ ${STEP_LABELS[outcome.step]} completed`);

      if (outcome.step === 'commit') {
        lines.push(`Version: ${this.version}`, `Commit Hash: ${commitHash}`, `Commit Message:\n${result.message}`);
      } else if (outcome.step === 'push') {
        lines.push(`Branch: ${this.deps.config.branch}`);
        if (outcome.output) lines.push(`Output: ${outcome.output}`);
      } else if (outcome.output) {
        lines.push(`Output: ${outcome.output}`);
      }

      lines.push('');
    }

    return lines;
  };

  private readonly printVerification = ({ localCommit: local, remoteCommit: remote, error }: PushVerification): void => {
    console.log('Push Verification:');
    if (error) {
      console.log(chalk.red(`  ✗ Could not verify push: ${error}`));
      return;
    }
    if (local) console.log(`  Local commit:  ${local.slice(0, 8)}...`);
    if (remote) console.log(`  Remote commit: ${remote.slice(0, 8)}...`);

    if (!remote) {
      console.log(chalk.gray(`  ℹ ${WARNING_MESSAGES.PUSH_UNVERIFIABLE}`));
    } else if (local === remote) {
      console.log(chalk.green(`  ✓ ${SUCCESS_MESSAGES.PUSH_VERIFIED}`));
    } else {
      console.log(chalk.yellow(`  ⚠ ${WARNING_MESSAGES.PUSH_MISMATCH}`));
    }
  };

  private readonly recordFailure = async (error: unknown): Promise<CycleResult> => {
    const { git, log, config } = this.deps;
    const secureError = ErrorHandler.getInstance().toSecureError(error, { operation: 'autoCommit' });
    const errorMessage = `${ERROR_MESSAGES.EXECUTION_FAILED}: ${secureError.message}`;

    console.error(chalk.red(`\n✗ ${errorMessage}`));

    const lastStatus = await git
      .getChangeSet()
      .then((changes) => buildChangeSummary(changes) ?? ERROR_MESSAGES.NO_CHANGES_FOUND)
      .catch((statusError: unknown) => `Error checking changes: ${ErrorHandler.getInstance().toSecureError(statusError).message}`);

    log.append(
      [
        `GIT AUTO OPERATION FAILED - Version ${this.version}`,
        `Time: ${formatTimestamp(this.now())}`,
        `Error: ${errorMessage}`,
        '',
        'Last Git Status:',
        lastStatus,
      ].join('\n')
    );

    try {
      const dump = log.writeErrorDump(errorMessage, { ...config });
      console.error(chalk.gray(`Error saved to file: ${dump}`));
    } catch (dumpError) {
      console.error(chalk.red(`✗ Could not write error file: ${ErrorHandler.getInstance().toSecureError(dumpError).message}`));
    }

    return { success: false, committed: false, version: this.version, error: errorMessage };
  };
}

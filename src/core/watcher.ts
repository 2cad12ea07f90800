import chalk from 'chalk';
import { match, P } from 'ts-pattern';
import type { RunLog } from '../services/run-log.js';
import type { ResolvedConfig } from '../schemas/validation.js';
import type { CycleResult } from '../types/common.js';
import { ErrorHandler } from '../utils/error-handler.js';
import { formatTimestamp } from '../utils/time.js';
import { printLogStatus } from '../utils/display.js';
import { sleep as defaultSleep } from '../utils/process-utils.js';
import { LOG_STATUS_EVERY_CHECKS, NO_INTERNET_SEPARATOR, SUMMARY_RULE } from '../constants/ui.js';
import { INFO_MESSAGES, WARNING_MESSAGES } from '../constants/messages.js';

export interface CycleRunner {
  run(): Promise<CycleResult>;
  readonly currentVersion: string;
}

export interface ConnectivityCheck {
  check(): Promise<string | null>;
}

export interface WatcherDeps {
  cycle: CycleRunner;
  connectivity: ConnectivityCheck;
  log: RunLog;
  config: ResolvedConfig;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => Date;
  signal?: AbortSignal;
  // Stop after this many checks instead of running until aborted.
  maxChecks?: number;
}

export interface WatchState {
  checkCount: number;
  online: boolean;
  pending: boolean;
  failures: number;
}

export const intervalLabel = (seconds: number): string =>
  match(seconds)
    .with(60, () => '1 minute')
    .with(300, () => '5 minutes')
    .with(P.number, (s) => `${s} seconds`)
    .exhaustive();

/** Wait before the next check: short while warming up, normal afterwards. */
export const intervalFor = (
  checkCount: number,
  config: Pick<ResolvedConfig, 'initialChecks' | 'initialInterval' | 'normalInterval'>
): { seconds: number; label: string } => {
  const seconds = checkCount <= config.initialChecks ? config.initialInterval : config.normalInterval;
  return { seconds, label: intervalLabel(seconds) };
};

/**
 * Periodically checks for connectivity and runs an auto-commit cycle while
 * online, retrying failed cycles up to `maxRetries` times.
 */
export class Watcher {
  private readonly state: WatchState = { checkCount: 0, online: false, pending: false, failures: 0 };
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => Date;

  constructor(private readonly deps: WatcherDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  get snapshot(): WatchState {
    return { ...this.state };
  }

  private readonly stopped = (): boolean =>
    this.deps.signal?.aborted === true ||
    (this.deps.maxChecks !== undefined && this.state.checkCount >= this.deps.maxChecks);

  start = async (): Promise<WatchState> => {
    const { log, config, cycle } = this.deps;

    log.appendBlock([
      `GIT AUTO SCRIPT STARTED - Version ${cycle.currentVersion}`,
      `Time: ${formatTimestamp(this.now())}`,
      `Configuration: ${JSON.stringify(config)}`,
      'Version progression: Auto-increment on each successful commit',
    ]);
    console.log(chalk.gray(`✓ Log file initialized: ${log.file}`));
    console.log(`\n${INFO_MESSAGES.STARTING_LOOP}`);

    while (!this.stopped()) {
      let seconds: number;
      try {
        seconds = await this.check();
      } catch (error) {
        seconds = this.recordUnexpectedError(error);
      }

      if (this.stopped()) break;

      console.log(`\n⏰ Waiting ${seconds} seconds for next check...`);
      await this.sleep(seconds * 1000, this.deps.signal);
    }

    this.shutdown();
    return this.snapshot;
  };

  /** One check; returns how many seconds to wait before the next. */
  check = async (): Promise<number> => {
    const { config, connectivity, cycle, log } = this.deps;
    const state = this.state;

    state.checkCount += 1;
    const { seconds, label } = intervalFor(state.checkCount, config);
    const time = formatTimestamp(this.now());

    console.log(`\n${'='.repeat(60)}
[${time}] Check #${state.checkCount} (interval: ${label})
Current Version: ${cycle.currentVersion}
${'='.repeat(60)}`);

    const via = await connectivity.check();

    if (via !== null) {
      console.log(chalk.green(`\nInternet connection: ✓ CONNECTED (via ${via})`));

      if (!state.online && state.pending) {
        console.log(INFO_MESSAGES.PENDING_RESUMED);
        state.pending = false;
      }

      const result = await cycle.run();
      if (result.success) {
        state.failures = 0;
      } else {
        state.failures += 1;
        if (state.failures >= config.maxRetries) {
          console.log(chalk.yellow(`\n⚠ Maximum retries (${config.maxRetries}) reached. Suspending operations.`));
          state.pending = false;
          state.failures = 0;
        } else {
          state.pending = true;
          console.log(chalk.yellow(`\n⚠ Operation failed (attempt ${state.failures}/${config.maxRetries})`));
        }
      }

      state.online = true;
    } else {
      console.log(chalk.red('\nInternet connection: ✗ DISCONNECTED'));
      console.log(WARNING_MESSAGES.INTERNET_DOWN);

      log.append(
        [
          `CHECK #${state.checkCount} - NO INTERNET`,
          `Time: ${time}`,
          'Status: Internet disconnected',
          `Pending operations: ${state.pending ? 'Yes' : 'No'}`,
          `Next check in: ${label}`,
        ].join('\n'),
        NO_INTERNET_SEPARATOR
      );

      if (state.online) {
        console.log(WARNING_MESSAGES.SUSPENDING);
        state.pending = true;
      }

      state.online = false;
    }

    this.printSummary(label);

    if (state.checkCount % LOG_STATUS_EVERY_CHECKS === 0) {
      printLogStatus(log.status(), config.maxLogLines);
    }

    return seconds;
  };

  private readonly printSummary = (nextCheck: string): void => {
    const { config, cycle } = this.deps;
    const state = this.state;
    const phase =
      state.checkCount <= config.initialChecks
        ? `Initial (${config.initialChecks - state.checkCount} remaining)`
        : 'Normal';

    console.log(`\n${SUMMARY_RULE}
Status Summary:
${SUMMARY_RULE}
  Total checks: ${state.checkCount}
  Current version: ${cycle.currentVersion}
  Phase: ${phase}
  Internet: ${state.online ? 'Connected' : 'Disconnected'}
  Pending ops: ${state.pending ? 'Yes' : 'No'}
  Failed attempts: ${state.failures}
  Next check: ${nextCheck}
${SUMMARY_RULE}`);
  };

  private readonly recordUnexpectedError = (error: unknown): number => {
    const { config, cycle, log } = this.deps;
    const message = `Unexpected error: ${ErrorHandler.getInstance().toSecureError(error, { operation: 'watch' }).message}`;
    console.error(chalk.yellow(`\n⚠ Error: ${message}`));

    log.append(
      [
        'UNEXPECTED ERROR IN MAIN LOOP',
        `Time: ${formatTimestamp(this.now())}`,
        `Error: ${message}`,
        `Check count: ${this.state.checkCount}`,
        `Current version: ${cycle.currentVersion}`,
      ].join('\n')
    );

    try {
      log.writeErrorDump(message, { ...config });
    } catch (dumpError) {
      console.error(chalk.red(`✗ Could not write error file: ${ErrorHandler.getInstance().toSecureError(dumpError).message}`));
    }

    return intervalFor(this.state.checkCount, config).seconds;
  };

  private readonly shutdown = (): void => {
    const { config, cycle, log } = this.deps;
    const state = this.state;
    const title = this.deps.signal?.aborted ? 'SCRIPT STOPPED BY USER' : `SCRIPT STOPPED AFTER ${state.checkCount} CHECKS`;
    const time = formatTimestamp(this.now());

    console.log(`\n\n${'='.repeat(60)}
${title}
${'='.repeat(60)}
Total checks performed: ${state.checkCount}
Final version: ${cycle.currentVersion}
Last check time: ${time}
Final internet status: ${state.online ? 'Connected' : 'Disconnected'}
Pending operations: ${state.pending ? 'Yes' : 'No'}`);

    printLogStatus(log.status(), config.maxLogLines);

    log.append(
      [
        title,
        `Time: ${time}`,
        `Total checks performed: ${state.checkCount}`,
        `Final version: ${cycle.currentVersion}`,
        `Final internet status: ${state.online ? 'Connected' : 'Disconnected'}`,
        `Pending operations: ${state.pending ? 'Yes' : 'No'}`,
        `Log file: ${log.file}`,
        `Max log lines configured: ${config.maxLogLines}`,
      ].join('\n')
    );
  };
}

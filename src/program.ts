import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { ConfigManager, parseConfigValue, resolveStatePaths } from './config.js';
import { CONFIG_KEYS, isConfigKey, type ResolvedConfig } from './schemas/validation.js';
import { GitService, type GitClient, type GitServiceOptions } from './services/git.js';
import { RunLog } from './services/run-log.js';
import { VersionStore } from './services/version-store.js';
import { ConnectivityChecker, type ProbeReport } from './services/connectivity.js';
import { PushRunner, terminalReporter } from './core/push-runner.js';
import { AutoCommitCycle } from './core/auto-commit.js';
import { Watcher, type ConnectivityCheck } from './core/watcher.js';
import { createSpinnerReporter } from './core/spinner-reporter.js';
import { collectRepoInfo } from './core/inspection.js';
import { ErrorType } from './types/error-handler.js';
import { SecureError, withErrorHandling } from './utils/error-handler.js';
import { incrementVersion, isValidVersion } from './utils/version.js';
import { sleep } from './utils/process-utils.js';
import {
  printConfiguration,
  printLogStatus,
  printProbeReports,
  printRepoInfo,
  printVersionProgression,
  printVersionSource,
} from './utils/display.js';
import { GIT_BLOCK_TIMEOUT_MS, GIT_DEFAULT_BRANCH, GIT_STATUS_RECENT_COMMITS } from './constants/git.js';
import { ERROR_MESSAGES, INFO_MESSAGES, SUCCESS_MESSAGES, WARNING_MESSAGES } from './constants/messages.js';

type InquirerModule = typeof import('inquirer');
type GradientStringModule = typeof import('gradient-string');

let inquirerCache: InquirerModule | null = null;
let gradientStringCache: GradientStringModule | null = null;

const loadInquirer = async (): Promise<InquirerModule> => {
  inquirerCache ??= await import('inquirer');
  return inquirerCache;
};

const loadGradientString = async (): Promise<GradientStringModule> => {
  gradientStringCache ??= await import('gradient-string');
  return gradientStringCache;
};

export type NetworkChecker = ConnectivityCheck & { probeAll(): Promise<ProbeReport[]> };

/** Everything the commands reach outside the process; tests swap these out. */
export interface ProgramDeps {
  createGit: (options: GitServiceOptions) => GitClient;
  createConnectivity: (timeoutMs: number) => NetworkChecker;
  configManager: () => ConfigManager;
  confirm: (message: string) => Promise<boolean>;
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const confirmWithPrompt = async (message: string): Promise<boolean> => {
  const { default: inquirer } = await loadInquirer();
  const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
    { type: 'confirm', name: 'confirm', message, default: false },
  ]);
  return confirm;
};

const defaultDeps: ProgramDeps = {
  createGit: (options) => new GitService(options),
  createConnectivity: (timeoutMs) => new ConnectivityChecker(timeoutMs),
  configManager: () => ConfigManager.getInstance(),
  confirm: confirmWithPrompt,
  sleep,
};

const parseCount = (value: string): number => {
  const count = Number.parseInt(value, 10);
  if (!Number.isInteger(count) || count < 1 || String(count) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive whole number.');
  }
  return count;
};

const requireRepository = async (git: GitClient, operation: string): Promise<void> => {
  if (!(await git.isRepository())) {
    throw new SecureError(ERROR_MESSAGES.NOT_GIT_REPOSITORY, ErrorType.GIT_ERROR, { operation }, true);
  }
};

interface RunOptions {
  message?: string;
  dryRun?: boolean;
}

interface WatchOptions {
  remote?: string;
  branch?: string;
  maxChecks?: number;
}

export const buildProgram = (version: string, overrides: Partial<ProgramDeps> = {}): Command => {
  const deps: ProgramDeps = { ...defaultDeps, ...overrides };
  const program = new Command();

  // Stages, commits and pushes once. Failures are git's to report: every
  // step runs and the command itself always succeeds.
  const runOnce = async (options: RunOptions): Promise<void> => {
    const message = options.message ?? deps.configManager().get('message');
    const runner = new PushRunner(deps.createGit({ passthrough: true }), terminalReporter);

    if (options.dryRun) {
      console.log(chalk.blue(INFO_MESSAGES.DRY_RUN));
      for (const { command } of runner.plan(message)) {
        console.log(`  $ ${command}`);
      }
      return;
    }

    await runner.run(message);
  };

  program
    .name('autopush')
    .description('Stage, commit and push the working tree in one go')
    .version(version)
    .enablePositionalOptions()
    // A mistyped command must not fall through to a push.
    .allowExcessArguments(false)
    .option('-m, --message <message>', 'Commit message to use instead of the configured one')
    .option('-d, --dry-run', 'Print the git commands without running them')
    .action(runOnce);

  program
    .command('run')
    .alias('r')
    .description('Run git add, git commit and git push once (the default command)')
    .option('-m, --message <message>', 'Commit message to use instead of the configured one')
    .option('-d, --dry-run', 'Print the git commands without running them')
    .action(runOnce);

  program
    .command('watch')
    .alias('w')
    .description('Keep committing and pushing changes while the internet is reachable')
    .option('--remote <remote>', 'Remote to push to')
    .option('--branch <branch>', 'Branch to push to (defaults to the current branch)')
    .option('--max-checks <count>', 'Stop after this many checks', parseCount)
    .action(async (options: WatchOptions): Promise<void> =>
      withErrorHandling(
        async (): Promise<void> => {
          const stored = deps.configManager().getConfig();
          const git = deps.createGit({ blockTimeoutMs: GIT_BLOCK_TIMEOUT_MS });
          await requireRepository(git, 'watch');

          const current = await git.currentBranch().catch(() => '');
          const config: ResolvedConfig = {
            ...stored,
            remote: options.remote ?? stored.remote,
            branch: options.branch ?? stored.branch ?? (current || GIT_DEFAULT_BRANCH),
          };

          const paths = resolveStatePaths(config, await git.gitDir());
          const log = new RunLog({
            file: paths.logFile,
            errorDir: paths.errorDir,
            maxLines: config.maxLogLines,
            rotationSize: config.logRotationSize,
          });
          const versions = new VersionStore(paths.versionFile, config.initialVersion);
          const loaded = versions.load();
          const connectivity = deps.createConnectivity(config.probeTimeout * 1000);
          const cycle = new AutoCommitCycle({
            git,
            log,
            versions,
            config,
            reporter: createSpinnerReporter(),
            sleep: deps.sleep,
          });

          console.log(chalk.blue(INFO_MESSAGES.BANNER));
          printConfiguration(config, config.branch);
          printVersionSource(loaded);
          printVersionProgression();
          printLogStatus(log.status(), config.maxLogLines);
          printRepoInfo(await collectRepoInfo(git));
          printProbeReports(await connectivity.probeAll());

          const controller = new AbortController();
          const stop = (): void => controller.abort();
          process.once('SIGINT', stop);

          try {
            await new Watcher({
              cycle,
              connectivity,
              log,
              config,
              signal: controller.signal,
              maxChecks: options.maxChecks,
              sleep: deps.sleep,
            }).start();
          } finally {
            process.off('SIGINT', stop);
          }
        },
        { operation: 'watch' }
      )
    );

  program
    .command('status')
    .alias('s')
    .description('Show repository information, the current version and the log file')
    .action(async (): Promise<void> =>
      withErrorHandling(
        async (): Promise<void> => {
          const config = deps.configManager().getConfig();
          const git = deps.createGit({});
          await requireRepository(git, 'status');

          const paths = resolveStatePaths(config, await git.gitDir());
          const { version: currentVersion } = new VersionStore(paths.versionFile, config.initialVersion).load();
          const log = new RunLog({
            file: paths.logFile,
            errorDir: paths.errorDir,
            maxLines: config.maxLogLines,
            rotationSize: config.logRotationSize,
          });

          printRepoInfo(await collectRepoInfo(git, GIT_STATUS_RECENT_COMMITS));
          console.log(`\nCurrent version: ${chalk.green(currentVersion)}`);
          printLogStatus(log.status(), config.maxLogLines);
        },
        { operation: 'status' }
      )
    );

  program
    .command('version')
    .alias('v')
    .description('Show the current and next auto-commit version')
    .action(async (): Promise<void> =>
      withErrorHandling(
        async (): Promise<void> => {
          const config = deps.configManager().getConfig();
          const git = deps.createGit({});
          await requireRepository(git, 'version');

          const paths = resolveStatePaths(config, await git.gitDir());
          const { version: currentVersion } = new VersionStore(paths.versionFile, config.initialVersion).load();

          console.log(`Current version: ${chalk.green(currentVersion)}`);
          if (!isValidVersion(currentVersion)) {
            console.log(chalk.yellow(`⚠ ${currentVersion} is not MAJOR.MINOR.PATCH; the next commit restarts the progression`));
          }
          console.log(`Next version: ${chalk.green(incrementVersion(currentVersion))}`);
          printVersionProgression();
        },
        { operation: 'version' }
      )
    );

  program
    .command('network')
    .alias('n')
    .description('Test every internet connection method')
    .action(async (): Promise<void> =>
      withErrorHandling(
        async (): Promise<void> => {
          const { probeTimeout } = deps.configManager().getConfig();
          const reports = await deps.createConnectivity(probeTimeout * 1000).probeAll();
          printProbeReports(reports);

          const via = reports.find((report) => report.connected);
          console.log(
            via
              ? chalk.green(`\nInternet connection: ✓ CONNECTED (via ${via.name})`)
              : chalk.red(`\nInternet connection: ✗ DISCONNECTED`)
          );
        },
        { operation: 'network' }
      )
    );

  const configCmd = program.command('config').description('Manage autopush configuration');

  configCmd
    .command('set <key> <value>')
    .description('Set configuration value')
    .action(async (key: string, value: string): Promise<void> => {
      await withErrorHandling(
        async (): Promise<void> => {
          if (!isConfigKey(key)) {
            throw new SecureError(
              `${ERROR_MESSAGES.INVALID_CONFIG_KEY}: ${key}. Allowed keys: ${CONFIG_KEYS.join(', ')}`,
              ErrorType.VALIDATION_ERROR,
              { operation: 'configSet', key },
              true
            );
          }

          const parsedValue = parseConfigValue(key, value);
          deps.configManager().set(key, parsedValue);
          console.log(chalk.green(`✓ Set ${key} = ${parsedValue}`));
        },
        { operation: 'configSet', key }
      );
    });

  configCmd
    .command('get [key]')
    .description('Get configuration value(s)')
    .action(async (key?: string): Promise<void> => {
      await withErrorHandling(
        async (): Promise<void> => {
          const config = deps.configManager();

          if (key) {
            if (!isConfigKey(key)) {
              throw new SecureError(
                `${ERROR_MESSAGES.INVALID_CONFIG_KEY}: ${key}. Allowed keys: ${CONFIG_KEYS.join(', ')}`,
                ErrorType.VALIDATION_ERROR,
                { operation: 'configGet', key },
                true
              );
            }
            console.log(`${key}: ${config.get(key) ?? 'Not set'}`);
            return;
          }

          const all = config.getConfig();
          console.log(chalk.blue('Current configuration:'));
          for (const k of CONFIG_KEYS) {
            console.log(`  ${k}: ${all[k] ?? chalk.gray('current branch')}`);
          }
        },
        { operation: 'configGet', key }
      );
    });

  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .action(async (): Promise<void> => {
      await withErrorHandling(
        async (): Promise<void> => {
          if (await deps.confirm('Are you sure you want to reset all configuration to defaults?')) {
            deps.configManager().reset();
            console.log(chalk.green(`✓ ${SUCCESS_MESSAGES.CONFIGURATION_RESET}`));
          } else {
            console.log(chalk.yellow(WARNING_MESSAGES.RESET_CANCELLED));
          }
        },
        { operation: 'configReset' }
      );
    });

  program
    .command('examples')
    .description('Show usage examples')
    .action(async (): Promise<void> => {
      const { pastel } = await loadGradientString();
      console.log(`${pastel('autopush usage examples:\n')}

${chalk.yellow('One-shot:')}
  autopush                          # git add . && git commit && git push
  autopush -m "docs: typo"          # Commit with this message instead
  autopush run --dry-run            # Print the commands only

${chalk.yellow('Watch mode:')}
  autopush watch                    # Commit and push on a schedule
  autopush watch --branch develop   # Push somewhere else
  autopush watch --max-checks 5     # Stop after five checks

${chalk.yellow('Information:')}
  autopush status                   # Repository, version and log status
  autopush version                  # Current and next version
  autopush network                  # Test connection methods

${chalk.yellow('Configuration:')}
  autopush config get               # View configuration
  autopush config set <key> <value> # Change a value
  autopush config reset             # Back to defaults`);
    });

  return program;
};

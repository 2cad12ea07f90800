import chalk from 'chalk';
import { match } from 'ts-pattern';
import type { AutopushConfig, LogStatus, RepoInfo } from '../types/common.js';
import type { ProbeReport } from '../services/connectivity.js';
import type { VersionSource } from '../services/version-store.js';
import { DEFAULT_CONFIG } from '../constants/config.js';
import { INFO_MESSAGES } from '../constants/messages.js';
import { LOG_STATUS_WARN_RATIO } from '../constants/ui.js';
import { VERSION_PROGRESSION } from '../constants/versioning.js';

// Keeps only printable ASCII, so odd remote names cannot garble the terminal.
const asciiOnly = (line: string): string => line.replace(/[^\x20-\x7e\t]/g, '');

export const printConfiguration = (config: AutopushConfig, branch: string): void => {
  console.log(`\nConfiguration:
  - First ${config.initialChecks} checks: every ${config.initialInterval} seconds
  - After that: every ${config.normalInterval} seconds
  - Max retries: ${config.maxRetries}
  - Timeout: ${config.probeTimeout} seconds
  - Target: ${config.remote}/${branch}
  - Log file: ${config.logFile}
  - Max log lines: ${config.maxLogLines}
  - Keep after rotation: ${config.logRotationSize} lines
  - Version file: ${config.versionFile}`);
};

// The rules are fixed; the sample run starts at the default version, not the current one.
export const printVersionProgression = (): void => {
  const rule = '='.repeat(50);
  console.log(`\n${chalk.blue(INFO_MESSAGES.VERSION_PROGRESSION)}
${rule}
Example progression from ${DEFAULT_CONFIG.initialVersion}:
${VERSION_PROGRESSION.map((step) => `  ${step}`).join('\n')}
${rule}`);
};

export const printVersionSource = ({ version, source }: { version: string; source: VersionSource }): void => {
  const line = match(source)
    .with('file', () => `✓ Loaded version: ${version}`)
    .with('empty-file', () => `Version file empty, using default: ${version}`)
    .with('missing-file', () => `Version file not found, using default: ${version}`)
    .with('unreadable-file', () => `Using default version: ${version}`)
    .exhaustive();
  console.log(chalk.gray(line));
};

export const printLogStatus = (status: LogStatus, maxLines: number): void => {
  if (!status.exists) {
    console.log(`\n${INFO_MESSAGES.LOG_STATUS} ${status.file} does not exist yet.`);
    return;
  }

  console.log(`\n${INFO_MESSAGES.LOG_STATUS}
  File: ${status.file}
  Lines: ${status.lines} / ${maxLines}
  Size: ${status.sizeKb.toFixed(2)} KB`);

  if (status.fillRatio >= LOG_STATUS_WARN_RATIO) {
    console.log(chalk.yellow(`  ⚠ Warning: Log file is ${(status.fillRatio * 100).toFixed(1)}% full`));
  }

  if (status.lastEntry) {
    console.log(`  Last entry: ${status.lastEntry}`);
  }
};

export const printRepoInfo = (info: RepoInfo): void => {
  console.log(`\n${INFO_MESSAGES.GIT_INFORMATION}`);
  console.log(`  Current branch: ${info.branch === 'N/A' ? 'Not available' : info.branch}`);
  console.log(`  Git user: ${info.user}`);

  if (info.remotes) {
    console.log('  Remote URLs:');
    info.remotes.split('\n').forEach((line) => console.log(`    ${asciiOnly(line)}`));
  }

  console.log('  Recent commits:');
  info.recentCommits.split('\n').forEach((line) => console.log(`    ${asciiOnly(line)}`));
};

export const printProbeReports = (reports: ProbeReport[]): void => {
  console.log('\nTesting internet connection methods:');
  for (const report of reports) {
    const mark = report.connected ? chalk.green('✓') : chalk.red('✗');
    console.log(`  ${report.name}: ${mark}${report.error ? chalk.gray(` (${report.error})`) : ''}`);
  }
};

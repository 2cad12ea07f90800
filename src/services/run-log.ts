import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import type { LogStatus } from '../types/common.js';
import { BLOCK_SEPARATOR, LOG_SEPARATOR, LOG_TAIL_SCAN_LINES } from '../constants/ui.js';
import { formatFileStamp, formatTimestamp } from '../utils/time.js';
import { sanitizeError } from '../utils/security.js';

export interface RunLogOptions {
  file: string;
  errorDir: string;
  maxLines: number;
  rotationSize: number;
  now?: () => Date;
}

// Splits text into lines that keep their terminators, like a line reader would.
const splitLines = (content: string): string[] => content.match(/[^\n]*\n|[^\n]+$/g) ?? [];

export class RunLog {
  readonly file: string;
  readonly errorDir: string;
  private readonly maxLines: number;
  private readonly rotationSize: number;
  private readonly now: () => Date;

  constructor(options: RunLogOptions) {
    this.file = options.file;
    this.errorDir = options.errorDir;
    this.maxLines = options.maxLines;
    this.rotationSize = options.rotationSize;
    this.now = options.now ?? (() => new Date());
  }

  private readonly readLines = (): string[] => splitLines(fs.readFileSync(this.file, 'utf-8'));

  private readonly ensureDir = (): void => {
    fs.mkdirSync(path.dirname(this.file), { recursive: true });
  };

  /**
   * Trims the log to its last `rotationSize` lines once it reaches
   * `maxLines`. Returns whether a rotation happened.
   */
  rotateIfNeeded = (): boolean => {
    if (!fs.existsSync(this.file)) return false;

    const lines = this.readLines();
    const total = lines.length;
    if (total < this.maxLines || this.rotationSize >= total) return false;

    const kept = lines.slice(-this.rotationSize);
    fs.writeFileSync(this.file, kept.join(''));

    const marker = [
      `\n${BLOCK_SEPARATOR}\n`,
      'LOG FILE ROTATED\n',
      `Time: ${formatTimestamp(this.now())}\n`,
      `Previous size: ${total} lines\n`,
      `New size: ${kept.length} lines\n`,
      `Rotation threshold: ${this.maxLines} lines\n`,
      `${BLOCK_SEPARATOR}\n\n`,
    ];
    fs.appendFileSync(this.file, marker.join(''));

    console.log(chalk.gray(`Log file rotated. Kept last ${kept.length} of ${total} lines.`));
    return true;
  };

  append = (message: string, separator: string = LOG_SEPARATOR): void => {
    try {
      this.ensureDir();
      this.rotateIfNeeded();
      fs.appendFileSync(
        this.file,
        `\n${separator}\n[${formatTimestamp(this.now())}]\n${separator}\n${message}\n`
      );
    } catch (error) {
      console.error(chalk.red(`✗ Error saving to log file: ${sanitizeError(error)}`));
    }
  };

  /** Writes a framed block without the timestamp header `append` adds. */
  appendBlock = (lines: string[]): void => {
    try {
      this.ensureDir();
      this.rotateIfNeeded();
      fs.appendFileSync(this.file, `\n${BLOCK_SEPARATOR}\n${lines.join('\n')}\n${BLOCK_SEPARATOR}\n`);
    } catch (error) {
      console.error(chalk.red(`✗ Error initializing log file: ${sanitizeError(error)}`));
    }
  };

  status = (): LogStatus => {
    if (!fs.existsSync(this.file)) {
      return { exists: false, file: this.file, lines: 0, sizeKb: 0, fillRatio: 0 };
    }

    const lines = this.readLines();
    const sizeKb = fs.statSync(this.file).size / 1024;

    let lastEntry: string | undefined;
    for (const line of lines.slice(-LOG_TAIL_SCAN_LINES).reverse()) {
      if (line.includes('Time:')) {
        lastEntry = line.trim().replace('Time:', '').trim();
        break;
      }
    }

    return {
      exists: true,
      file: this.file,
      lines: lines.length,
      sizeKb,
      fillRatio: lines.length / this.maxLines,
      lastEntry,
    };
  };

  /**
   * Saves a standalone error report and mirrors the message into the log.
   * Returns the report's path.
   */
  writeErrorDump = (message: string, details: Record<string, unknown> = {}): string => {
    const now = this.now();
    fs.mkdirSync(this.errorDir, { recursive: true });

    const file = path.join(this.errorDir, `error_${formatFileStamp(now)}.txt`);
    fs.writeFileSync(
      file,
      [
        `Error time: ${formatTimestamp(now)}`,
        `Error: ${message}`,
        `Config: ${JSON.stringify(details)}`,
        `Platform: ${process.platform}`,
        '',
      ].join('\n')
    );

    this.append(`ERROR: ${message}`);
    return file;
  };
}

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { sanitizeError } from '../utils/security.js';

export type VersionSource = 'file' | 'empty-file' | 'missing-file' | 'unreadable-file';

/**
 * Persists the auto-commit version between runs in a one-line text file.
 */
export class VersionStore {
  constructor(
    readonly file: string,
    private readonly initialVersion: string
  ) {}

  load = (): { version: string; source: VersionSource } => {
    if (!fs.existsSync(this.file)) {
      return { version: this.initialVersion, source: 'missing-file' };
    }

    try {
      const stored = fs.readFileSync(this.file, 'utf-8').trim();
      if (!stored) {
        return { version: this.initialVersion, source: 'empty-file' };
      }
      return { version: stored, source: 'file' };
    } catch (error) {
      console.warn(chalk.yellow(`⚠ Error loading version file: ${sanitizeError(error)}`));
      return { version: this.initialVersion, source: 'unreadable-file' };
    }
  };

  save = (version: string): void => {
    fs.mkdirSync(path.dirname(this.file), { recursive: true });
    fs.writeFileSync(this.file, version);
  };
}

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RunLog } from './run-log.js';

const NOW = new Date(2026, 0, 5, 14, 7, 9);

describe('RunLog', () => {
  let dir: string;
  let file: string;

  const createLog = (maxLines = 2000, rotationSize = 1000): RunLog =>
    new RunLog({ file, errorDir: path.join(dir, 'errors'), maxLines, rotationSize, now: () => NOW });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'autopush-log-'));
    file = path.join(dir, 'state', 'autopush.log');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('appends timestamped entries, creating the directory', () => {
    createLog().append('hello');

    expect(fs.readFileSync(file, 'utf-8')).toBe(
      `\n${'='.repeat(60)}\n[2026-01-05 14:07:09]\n${'='.repeat(60)}\nhello\n`
    );
  });

  it('uses a custom separator', () => {
    createLog().append('offline', '-'.repeat(40));

    expect(fs.readFileSync(file, 'utf-8')).toBe(
      `\n${'-'.repeat(40)}\n[2026-01-05 14:07:09]\n${'-'.repeat(40)}\noffline\n`
    );
  });

  it('keeps the newest lines once the limit is reached', () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, ['1', '2', '3', '4', '5', '6'].map((n) => `line ${n}\n`).join(''));

    const rotated = createLog(5, 2).rotateIfNeeded();

    expect(rotated).toBe(true);
    expect(fs.readFileSync(file, 'utf-8')).toBe(
      [
        'line 5',
        'line 6',
        '',
        '='.repeat(80),
        'LOG FILE ROTATED',
        'Time: 2026-01-05 14:07:09',
        'Previous size: 6 lines',
        'New size: 2 lines',
        'Rotation threshold: 5 lines',
        '='.repeat(80),
        '',
        '',
      ].join('\n')
    );
  });

  it('leaves a short log alone', () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, 'line 1\nline 2\n');

    expect(createLog(5, 2).rotateIfNeeded()).toBe(false);
    expect(fs.readFileSync(file, 'utf-8')).toBe('line 1\nline 2\n');
  });

  it('reports status with the latest time stamp', () => {
    const log = createLog(100, 10);
    log.appendBlock(['SCRIPT STARTED', 'Time: 2026-01-05 14:00:00']);

    const status = log.status();

    expect(status.exists).toBe(true);
    expect(status.lines).toBe(5);
    expect(status.fillRatio).toBe(0.05);
    expect(status.lastEntry).toBe('2026-01-05 14:00:00');
  });

  it('reports a missing log', () => {
    expect(createLog().status()).toEqual({ exists: false, file, lines: 0, sizeKb: 0, fillRatio: 0 });
  });

  it('writes an error dump and mirrors it into the log', () => {
    const log = createLog();
    const dump = log.writeErrorDump('push failed', { remote: 'origin' });

    expect(dump).toBe(path.join(dir, 'errors', 'error_20260105_140709.txt'));
    expect(fs.readFileSync(dump, 'utf-8')).toBe(
      `Error time: 2026-01-05 14:07:09\nError: push failed\nConfig: {"remote":"origin"}\nPlatform: ${process.platform}\n`
    );
    expect(fs.readFileSync(file, 'utf-8')).toContain('ERROR: push failed');
  });
});

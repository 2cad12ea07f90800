import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Watcher, intervalFor, intervalLabel, type CycleRunner } from './watcher.js';
import { RunLog } from '../services/run-log.js';
import { DEFAULT_CONFIG } from '../constants/config.js';
import type { CycleResult } from '../types/common.js';

const NOW = new Date(2026, 9, 19, 9, 0, 0);
const CONFIG = { ...DEFAULT_CONFIG, branch: 'main' };

const ok: CycleResult = { success: true, committed: true, version: '1.1.4' };
const failed: CycleResult = { success: false, committed: false, version: '1.1.4', error: 'push rejected' };

describe('intervalFor', () => {
  it('uses the initial interval for the first checks', () => {
    expect(intervalFor(1, CONFIG)).toEqual({ seconds: 60, label: '1 minute' });
    expect(intervalFor(3, CONFIG)).toEqual({ seconds: 60, label: '1 minute' });
  });

  it('switches to the normal interval afterwards', () => {
    expect(intervalFor(4, CONFIG)).toEqual({ seconds: 300, label: '5 minutes' });
  });

  it('labels other intervals in seconds', () => {
    expect(intervalLabel(45)).toBe('45 seconds');
  });
});

describe('Watcher', () => {
  let dir: string;
  let log: RunLog;
  let sleep: Mock<(ms: number, signal?: AbortSignal) => Promise<void>>;
  let connectivity: { check: Mock<() => Promise<string | null>> };
  let cycle: CycleRunner & { run: Mock<() => Promise<CycleResult>> };

  const createWatcher = (maxChecks?: number, signal?: AbortSignal): Watcher =>
    new Watcher({ cycle, connectivity, log, config: CONFIG, sleep, now: () => NOW, maxChecks, signal });

  const readLog = (): string => fs.readFileSync(log.file, 'utf-8');

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'autopush-watch-'));
    log = new RunLog({
      file: path.join(dir, 'autopush.log'),
      errorDir: path.join(dir, 'errors'),
      maxLines: 2000,
      rotationSize: 1000,
      now: () => NOW,
    });
    sleep = vi.fn<(ms: number, signal?: AbortSignal) => Promise<void>>(async () => undefined);
    connectivity = { check: vi.fn<() => Promise<string | null>>(async () => 'HTTP') };
    cycle = { run: vi.fn<() => Promise<CycleResult>>(async () => ok), currentVersion: '1.1.3' };
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('runs a cycle per check and waits between checks', async () => {
    const state = await createWatcher(4).start();

    expect(cycle.run).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([60000, 60000, 60000]);
    expect(state).toEqual({ checkCount: 4, online: true, pending: false, failures: 0 });

    const written = readLog();
    expect(written).toContain('GIT AUTO SCRIPT STARTED - Version 1.1.3');
    expect(written).toContain('SCRIPT STOPPED AFTER 4 CHECKS');
  });

  it('skips the cycle while offline and logs the check', async () => {
    connectivity.check.mockResolvedValue(null);

    const state = await createWatcher(1).start();

    expect(cycle.run).not.toHaveBeenCalled();
    expect(state).toEqual({ checkCount: 1, online: false, pending: false, failures: 0 });
    expect(readLog()).toContain(
      `\n${'-'.repeat(40)}\n[2026-10-19 09:00:00]\n${'-'.repeat(40)}\nCHECK #1 - NO INTERNET\n`
    );
  });

  it('marks work pending when the connection drops', async () => {
    connectivity.check.mockResolvedValueOnce('HTTP').mockResolvedValueOnce(null);

    const state = await createWatcher(2).start();

    expect(cycle.run).toHaveBeenCalledTimes(1);
    expect(state).toEqual({ checkCount: 2, online: false, pending: true, failures: 0 });
  });

  it('resumes pending work once back online', async () => {
    connectivity.check
      .mockResolvedValueOnce('HTTP')
      .mockResolvedValueOnce(null)
      .mockResolvedValueOnce('DNS');

    const state = await createWatcher(3).start();

    expect(cycle.run).toHaveBeenCalledTimes(2);
    expect(state).toEqual({ checkCount: 3, online: true, pending: false, failures: 0 });
  });

  it('counts failed cycles and suspends after the retry limit', async () => {
    cycle.run.mockResolvedValue(failed);
    const watcher = createWatcher();

    await watcher.check();
    expect(watcher.snapshot).toEqual({ checkCount: 1, online: true, pending: true, failures: 1 });

    await watcher.check();
    expect(watcher.snapshot.failures).toBe(2);

    await watcher.check();
    expect(watcher.snapshot).toEqual({ checkCount: 3, online: true, pending: false, failures: 0 });
  });

  it('resets the failure count after a successful cycle', async () => {
    cycle.run.mockResolvedValueOnce(failed).mockResolvedValueOnce(ok);
    const watcher = createWatcher();

    await watcher.check();
    await watcher.check();

    expect(watcher.snapshot.failures).toBe(0);
  });

  it('keeps going after an unexpected error', async () => {
    connectivity.check.mockRejectedValueOnce(new Error('probe crashed')).mockResolvedValueOnce('HTTP');

    const state = await createWatcher(2).start();

    expect(state.checkCount).toBe(2);
    expect(cycle.run).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(60000, undefined);

    const written = readLog();
    expect(written).toContain('UNEXPECTED ERROR IN MAIN LOOP');
    expect(written).toContain('Error: Unexpected error: probe crashed');
    expect(fs.readdirSync(path.join(dir, 'errors'))).toEqual(['error_20261019_090000.txt']);
  });

  it('stops when aborted', async () => {
    const controller = new AbortController();
    sleep.mockImplementation(async () => controller.abort());

    const state = await createWatcher(undefined, controller.signal).start();

    expect(state.checkCount).toBe(1);
    expect(readLog()).toContain('SCRIPT STOPPED BY USER');
  });
});

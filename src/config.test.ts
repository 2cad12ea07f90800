import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigManager, parseConfigValue, resolveStatePaths } from './config.js';
import { DEFAULT_CONFIG } from './constants/config.js';
import { SecureError } from './utils/error-handler.js';

describe('ConfigManager', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'autopush-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('uses defaults when no config file exists', () => {
    expect(new ConfigManager(dir).getConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('fills missing keys of a stored config with defaults', () => {
    fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify({ message: 'wip', branch: 'develop' }));

    const config = new ConfigManager(dir).getConfig();

    expect(config.message).toBe('wip');
    expect(config.branch).toBe('develop');
    expect(config.normalInterval).toBe(300);
  });

  it('falls back to defaults for an invalid config file', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify({ maxRetries: 0 }));

    expect(new ConfigManager(dir).getConfig()).toEqual(DEFAULT_CONFIG);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('falls back to defaults for unparsable JSON', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    fs.writeFileSync(path.join(dir, 'config.json'), '{ not json');

    expect(new ConfigManager(dir).getConfig()).toEqual(DEFAULT_CONFIG);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('persists values that pass validation', () => {
    const manager = new ConfigManager(dir);
    manager.set('initialInterval', 30);

    expect(manager.get('initialInterval')).toBe(30);
    const stored = JSON.parse(fs.readFileSync(path.join(dir, 'config.json'), 'utf-8'));
    expect(stored.initialInterval).toBe(30);
    expect(new ConfigManager(dir).get('initialInterval')).toBe(30);
  });

  it('rejects values that fail validation', () => {
    const manager = new ConfigManager(dir);

    expect(() => manager.set('normalInterval', -5)).toThrow(SecureError);
    expect(() => manager.set('logRotationSize', 5000)).toThrow(
      'Invalid value for logRotationSize: logRotationSize must be smaller than maxLogLines'
    );
    expect(manager.get('normalInterval')).toBe(300);
  });

  it('rejects state paths that leave the repository', () => {
    expect(() => new ConfigManager(dir).set('stateDir', '../elsewhere')).toThrow(
      'Invalid value for stateDir: Path must not leave the git directory'
    );
  });

  it('resets to defaults', () => {
    const manager = new ConfigManager(dir);
    manager.set('message', 'custom');
    manager.reset();

    expect(manager.getConfig()).toEqual(DEFAULT_CONFIG);
    expect(new ConfigManager(dir).get('message')).toBe(DEFAULT_CONFIG.message);
  });
});

describe('resolveStatePaths', () => {
  it('places state files in the git directory', () => {
    const stateDir = path.resolve('/work/repo/.git', 'autopush');

    expect(resolveStatePaths(DEFAULT_CONFIG, '/work/repo/.git')).toEqual({
      stateDir,
      logFile: path.join(stateDir, 'autopush.log'),
      errorDir: path.join(stateDir, 'errors'),
      versionFile: path.join(stateDir, 'version'),
    });
  });

  it('follows a worktree git directory outside the checkout', () => {
    const gitDir = '/work/repo/.git/worktrees/feature';

    expect(resolveStatePaths(DEFAULT_CONFIG, gitDir).logFile).toBe(
      path.join(path.resolve(gitDir, 'autopush'), 'autopush.log')
    );
  });
});

describe('parseConfigValue', () => {
  it('converts numeric keys', () => {
    expect(parseConfigValue('normalInterval', '120')).toBe(120);
    expect(parseConfigValue('maxRetries', 'many')).toBe('many');
    expect(parseConfigValue('maxRetries', ' ')).toBe(' ');
  });

  it('keeps text keys exactly as typed', () => {
    expect(parseConfigValue('branch', '2024')).toBe('2024');
    expect(parseConfigValue('remote', 'true')).toBe('true');
    expect(parseConfigValue('message', '42')).toBe('42');
    expect(parseConfigValue('stateDir', '0')).toBe('0');
  });
});

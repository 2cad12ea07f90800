import { simpleGit, type SimpleGit, type SimpleGitOptions } from 'simple-git';
import type { ChangeSet, PushTarget } from '../types/common.js';
import { ErrorType } from '../types/error-handler.js';
import { SecureError } from '../utils/error-handler.js';
import { sanitizeError } from '../utils/security.js';

/**
 * The git operations autopush needs. `GitService` runs them through simple-git;
 * tests substitute an in-process fake.
 */
export interface GitClient {
  isRepository(): Promise<boolean>;
  /** Absolute path of this checkout's git directory; `.git` may be a file pointing elsewhere. */
  gitDir(): Promise<string>;
  stageAll(): Promise<string>;
  /** Resolves to the new commit hash, or '' when git created no commit. */
  commit(message: string): Promise<string>;
  push(target?: PushTarget): Promise<string>;
  getChangeSet(): Promise<ChangeSet>;
  headCommit(short?: boolean): Promise<string>;
  remoteHead(remote: string, branch: string): Promise<string | null>;
  currentBranch(): Promise<string>;
  remoteUrls(): Promise<string[]>;
  recentCommits(count: number): Promise<string[]>;
  userIdentity(): Promise<string | null>;
}

export interface GitServiceOptions {
  baseDir?: string;
  // Stream git's own stdout/stderr to the terminal as it runs.
  passthrough?: boolean;
  blockTimeoutMs?: number;
}

export class GitService implements GitClient {
  private readonly git: SimpleGit;
  readonly baseDir: string;

  constructor(options: GitServiceOptions = {}) {
    this.baseDir = options.baseDir ?? process.cwd();

    const gitOptions: Partial<SimpleGitOptions> = { baseDir: this.baseDir };
    if (options.blockTimeoutMs !== undefined) {
      gitOptions.timeout = { block: options.blockTimeoutMs };
    }

    this.git = simpleGit(gitOptions);

    if (options.passthrough) {
      this.git.outputHandler((_command, stdout, stderr) => {
        stdout.pipe(process.stdout, { end: false });
        stderr.pipe(process.stderr, { end: false });
      });
    }
  }

  private readonly run = async <T>(operation: string, task: () => Promise<T>): Promise<T> => {
    try {
      return await task();
    } catch (error) {
      throw new SecureError(sanitizeError(error), ErrorType.GIT_ERROR, { operation }, true);
    }
  };

  isRepository = async (): Promise<boolean> => {
    try {
      return await this.git.checkIsRepo();
    } catch {
      return false;
    }
  };

  gitDir = async (): Promise<string> =>
    this.run('gitDir', async () => (await this.git.revparse(['--absolute-git-dir'])).trim());

  stageAll = async (): Promise<string> =>
    this.run('stageAll', async () => (await this.git.add('.')).trim());

  commit = async (message: string): Promise<string> =>
    this.run('commit', async () => {
      const result = await this.git.commit(message);
      return result.commit;
    });

  push = async (target?: PushTarget): Promise<string> =>
    this.run('push', async () => {
      const result = target
        ? await this.git.push(target.remote, target.branch, ['--set-upstream'])
        : await this.git.push();

      return result.pushed.map((item) => `${item.local} -> ${item.remote}`).join('\n');
    });

  getChangeSet = async (): Promise<ChangeSet> =>
    this.run('getChangeSet', async () => {
      const status = await this.git.status();

      const added = [...status.created, ...status.not_added];
      const modified = [...status.modified];
      const deleted = [...status.deleted];
      const renamed = status.renamed.map((r) => ({ from: r.from, to: r.to }));

      return { added, modified, deleted, renamed };
    });

  headCommit = async (short: boolean = false): Promise<string> =>
    this.run('headCommit', async () =>
      (await this.git.revparse(short ? ['--short', 'HEAD'] : ['HEAD'])).trim()
    );

  remoteHead = async (remote: string, branch: string): Promise<string | null> =>
    this.run('remoteHead', async () => {
      const output = (await this.git.listRemote([remote, `refs/heads/${branch}`])).trim();
      if (!output) return null;
      return output.split(/\s+/)[0] ?? null;
    });

  currentBranch = async (): Promise<string> =>
    this.run('currentBranch', async () => (await this.git.raw(['branch', '--show-current'])).trim());

  remoteUrls = async (): Promise<string[]> =>
    this.run('remoteUrls', async () => {
      const remotes = await this.git.getRemotes(true);
      return remotes.flatMap((remote) => [
        `${remote.name}\t${remote.refs.fetch} (fetch)`,
        `${remote.name}\t${remote.refs.push} (push)`,
      ]);
    });

  recentCommits = async (count: number): Promise<string[]> =>
    this.run('recentCommits', async () => {
      const log = await this.git.log({ maxCount: count });
      return log.all.map((entry) => `${entry.hash.slice(0, 7)} ${entry.message}`);
    });

  userIdentity = async (): Promise<string | null> => {
    try {
      const name = (await this.git.getConfig('user.name')).value;
      const email = (await this.git.getConfig('user.email')).value;
      if (!name || !email) return null;
      return `${name} <${email}>`;
    } catch {
      return null;
    }
  };
}

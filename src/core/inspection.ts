import type { GitClient } from '../services/git.js';
import type { PushVerification, RepoInfo } from '../types/common.js';
import { GIT_RECENT_COMMITS } from '../constants/git.js';
import { sanitizeError } from '../utils/security.js';

const orFallback = <T>(promise: Promise<T>, fallback: T): Promise<T> => promise.catch(() => fallback);

/**
 * Compares HEAD with the remote branch ref. A remote without the ref cannot
 * be checked and counts as verified; a differing ref does not.
 */
export const verifyPush = async (git: GitClient, remote: string, branch: string): Promise<PushVerification> => {
  try {
    const localCommit = await git.headCommit();
    const remoteCommit = await orFallback(git.remoteHead(remote, branch), null);

    if (remoteCommit === null) {
      return { verified: true, localCommit };
    }

    return { verified: localCommit === remoteCommit, localCommit, remoteCommit };
  } catch (error) {
    return { verified: false, error: sanitizeError(error) };
  }
};

export const collectRepoInfo = async (git: GitClient, commitCount: number = GIT_RECENT_COMMITS): Promise<RepoInfo> => {
  const branch = await orFallback(git.currentBranch(), '');
  const user = await orFallback(git.userIdentity(), null);
  const remotes = await orFallback(git.remoteUrls(), []);
  const commits = await orFallback(git.recentCommits(commitCount), []);

  return {
    branch: branch || 'N/A',
    user: user ?? 'Not configured',
    remotes: remotes.map((line) => sanitizeError(line)).join('\n'),
    recentCommits: commits.length > 0 ? commits.join('\n') : 'No commits yet',
  };
};

export interface AutopushConfig {
  message: string;
  remote: string;
  branch?: string;
  initialInterval: number; // seconds
  normalInterval: number; // seconds
  initialChecks: number;
  maxRetries: number;
  probeTimeout: number; // seconds
  maxLogLines: number;
  logRotationSize: number;
  stateDir: string;
  logFile: string;
  errorDir: string;
  versionFile: string;
  initialVersion: string;
}

export interface ChangeSet {
  added: string[];
  modified: string[];
  deleted: string[];
  renamed: Array<{ from: string; to: string }>;
}

export type PushStep = 'add' | 'commit' | 'push';

export interface StepOutcome {
  step: PushStep;
  command: string;
  ok: boolean;
  output?: string;
  error?: string;
}

export interface PushRunResult {
  message: string;
  steps: StepOutcome[];
  commit?: string; // empty when git created no commit
}

export interface PushTarget {
  remote: string;
  branch: string;
}

export interface PushRunOptions {
  stopOnFailure?: boolean;
  target?: PushTarget;
}

export interface PushVerification {
  verified: boolean;
  localCommit?: string;
  remoteCommit?: string;
  error?: string;
}

export interface RepoInfo {
  branch: string;
  user: string;
  remotes: string;
  recentCommits: string;
}

export interface LogStatus {
  exists: boolean;
  file: string;
  lines: number;
  sizeKb: number;
  fillRatio: number;
  lastEntry?: string;
}

export interface CycleResult {
  success: boolean;
  committed: boolean;
  version?: string;
  commit?: string;
  verified?: boolean;
  error?: string;
}

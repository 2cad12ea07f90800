import chalk from 'chalk';
import type { GitClient } from '../services/git.js';
import type { PushRunOptions, PushRunResult, PushStep, PushTarget, StepOutcome } from '../types/common.js';
import { sanitizeError } from '../utils/security.js';

export interface PlannedStep {
  step: PushStep;
  command: string;
  execute: () => Promise<string>;
}

export interface StepReporter {
  stepStarted(step: PushStep, command: string): void;
  stepFinished(outcome: StepOutcome): void;
}

/**
 * Prints the command about to run and nothing else: git's own output is
 * streamed to the terminal by the passthrough git client.
 */
export const terminalReporter: StepReporter = {
  stepStarted: (_step, command) => console.log(chalk.cyan(`\n$ ${command}`)),
  stepFinished: () => undefined,
};

export const silentReporter: StepReporter = {
  stepStarted: () => undefined,
  stepFinished: () => undefined,
};

/**
 * Stages everything, commits with the given message and pushes, one command
 * after another. A failing step does not stop the next one unless the caller
 * asks for `stopOnFailure`.
 */
export class PushRunner {
  constructor(
    private readonly git: GitClient,
    private readonly reporter: StepReporter = terminalReporter
  ) {}

  plan = (message: string, target?: PushTarget): PlannedStep[] => [
    {
      step: 'add',
      command: 'git add .',
      execute: () => this.git.stageAll(),
    },
    {
      step: 'commit',
      command: `git commit -m ${JSON.stringify(message)}`,
      execute: async () => {
        const hash = await this.git.commit(message);
        if (!hash) {
          throw new Error('nothing to commit');
        }
        return hash;
      },
    },
    {
      step: 'push',
      command: target ? `git push -u ${target.remote} ${target.branch}` : 'git push',
      execute: () => this.git.push(target),
    },
  ];

  run = async (message: string, options: PushRunOptions = {}): Promise<PushRunResult> => {
    const steps: StepOutcome[] = [];
    let commit: string | undefined;

    for (const { step, command, execute } of this.plan(message, options.target)) {
      this.reporter.stepStarted(step, command);

      let outcome: StepOutcome;
      try {
        const output = await execute();
        outcome = { step, command, ok: true, output };
      } catch (error) {
        outcome = { step, command, ok: false, error: sanitizeError(error) };
      }

      steps.push(outcome);
      this.reporter.stepFinished(outcome);

      if (step === 'commit') {
        commit = outcome.ok ? outcome.output : '';
      }

      if (!outcome.ok && options.stopOnFailure) {
        break;
      }
    }

    return { message, steps, commit };
  };
}

export const failedStep = (result: PushRunResult): StepOutcome | undefined =>
  result.steps.find((outcome) => !outcome.ok);

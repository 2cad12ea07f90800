import ora, { type Ora } from 'ora';
import type { StepReporter } from './push-runner.js';
import { SPINNER_MESSAGES, STEP_LABELS } from '../constants/ui.js';
import type { PushStep } from '../types/common.js';

const STEP_SPINNER_TEXT: Record<PushStep, string> = {
  add: SPINNER_MESSAGES.STAGING,
  commit: SPINNER_MESSAGES.COMMITTING,
  push: SPINNER_MESSAGES.PUSHING,
};

/** Reports each step of a watch cycle with an ora spinner. */
export const createSpinnerReporter = (): StepReporter => {
  let spinner: Ora | undefined;

  return {
    stepStarted: (step) => {
      spinner = ora(STEP_SPINNER_TEXT[step]).start();
    },
    stepFinished: (outcome) => {
      const label = STEP_LABELS[outcome.step];
      if (outcome.ok) {
        spinner?.succeed(`${label} completed`);
      } else {
        spinner?.fail(`${label} failed: ${outcome.error ?? 'unknown error'}`);
      }
      spinner = undefined;
    },
  };
};

import { EXIT_DELAY_MS } from '../constants/ui.js';

/**
 * Exits after a short delay so buffered terminal output is flushed first.
 */
export const exitProcess = (exitCode: number = 0): void => {
  setTimeout(() => process.exit(exitCode), EXIT_DELAY_MS);
};

/**
 * Resolves after `ms`, or as soon as `signal` aborts.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });

/**
 * Spinner shown while the schedule page and talk pages are downloaded
 *
 * Disabled for --json output, non-TTY streams and PowerShell hosts.
 */

import ora, { type Ora } from 'ora';
import { getOutputOptions } from './output.js';
import { isInteractiveTTY, isPowerShellHost } from './platform.js';

export const BRAILLE_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

export interface SpinnerOptions {
  text: string;
  /** Stream to output to (default: stderr) */
  stream?: NodeJS.WritableStream;
}

export function shouldShowSpinner(): boolean {
  if (getOutputOptions().json) {
    return false;
  }
  if (!isInteractiveTTY()) {
    return false;
  }
  return !isPowerShellHost();
}

/**
 * Create and start a spinner, or return null when spinners are disabled.
 * Ctrl-C while spinning stops the spinner and exits with 130.
 */
export function createSpinner(options: SpinnerOptions): Ora | null {
  if (!shouldShowSpinner()) {
    return null;
  }

  const spinner = ora({
    text: options.text,
    stream: options.stream || process.stderr,
    spinner: {
      frames: BRAILLE_FRAMES,
      interval: 80,
    },
  });

  // 130 = 128 + SIGINT
  let cleanupCalled = false;
  const cleanup = () => {
    if (cleanupCalled) return;
    cleanupCalled = true;
    spinner.stop();
    process.exit(130);
  };

  process.on('SIGINT', cleanup);
  spinner.start();

  const removeCleanup = () => {
    if (!cleanupCalled) {
      process.removeListener('SIGINT', cleanup);
    }
  };

  const originalStop = spinner.stop.bind(spinner);
  const originalSucceed = spinner.succeed.bind(spinner);
  const originalFail = spinner.fail.bind(spinner);

  spinner.stop = () => {
    removeCleanup();
    return originalStop();
  };

  spinner.succeed = (text?: string) => {
    removeCleanup();
    return originalSucceed(text);
  };

  spinner.fail = (text?: string) => {
    removeCleanup();
    return originalFail(text);
  };

  return spinner;
}

/**
 * Run an async step behind a spinner; the spinner succeeds or fails with it
 *
 * @example
 * ```typescript
 * const html = await withSpinner('Fetching schedule...', () => fetcher.fetchSchedule(url));
 * ```
 */
export async function withSpinner<T>(
  text: string,
  fn: () => Promise<T>,
  successText?: string,
  failText?: string
): Promise<T> {
  const spinner = createSpinner({ text });

  try {
    const result = await fn();
    spinner?.succeed(successText);
    return result;
  } catch (error) {
    spinner?.fail(failText);
    throw error;
  }
}

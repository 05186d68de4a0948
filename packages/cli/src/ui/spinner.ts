/**
 * Spinner - Progress spinner for project loading
 */

import ora from 'ora';

import type { Ora } from 'ora';

/**
 * Spinner configuration options
 */
export interface SpinnerOptions {
  /** Spinner text */
  text?: string;
  /** Whether to show anything at all (false in CI, in tests and for machine-readable output) */
  enabled?: boolean;
}

/**
 * Spinner wrapper for consistent CLI feedback
 */
export class Spinner {
  private spinner: Ora;

  constructor(options: SpinnerOptions = {}) {
    const enabled = options.enabled ?? (Boolean(process.stderr.isTTY) && !process.env['CI']);

    this.spinner = ora({
      color: 'cyan',
      isEnabled: enabled,
      isSilent: !enabled,
      ...(options.text ? { text: options.text } : {}),
    });
  }

  start(): this {
    this.spinner.start();
    return this;
  }

  succeed(text?: string): this {
    this.spinner.succeed(text);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }
}

/**
 * Run an operation with a spinner
 */
export async function withSpinner<T>(
  text: string,
  operation: () => T | Promise<T>,
  options: {
    enabled?: boolean;
    successText?: string | ((result: T) => string);
  } = {}
): Promise<T> {
  const spinner = new Spinner({
    text,
    ...(options.enabled !== undefined ? { enabled: options.enabled } : {}),
  });
  spinner.start();

  try {
    const result = await operation();
    const successText =
      typeof options.successText === 'function' ? options.successText(result) : options.successText;
    spinner.succeed(successText);
    return result;
  } catch (error) {
    spinner.fail(error instanceof Error ? error.message : String(error));
    throw error;
  }
}

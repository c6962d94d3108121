import ora, { type Ora } from 'ora';

// ── TTY-Aware Spinner ───────────────────────────────────────────────────────
// Wraps `ora` with a consistent API. Falls back to static lines in non-TTY
// contexts (CI, piped output). Writes to stderr to keep stdout clean.

export interface SpinnerHandle {
  /** Update the spinner text while it's running. */
  update(text: string): void;
  /** Stop with a success checkmark and message. */
  succeed(text?: string): void;
  /** Stop with a failure cross and message. */
  fail(text?: string): void;
  /** Stop the spinner without a status symbol. */
  stop(): void;
}

export interface SpinnerOptions {
  quiet?: boolean;
  stream?: NodeJS.WriteStream;
}

/**
 * Create and start a spinner with the given text.
 * In non-TTY environments, prints a static line instead; in quiet mode prints nothing.
 */
export function startSpinner(text: string, opts: SpinnerOptions = {}): SpinnerHandle {
  const stream = opts.stream ?? process.stderr;

  if (opts.quiet) {
    return { update() {}, succeed() {}, fail() {}, stop() {} };
  }

  if (!stream.isTTY) {
    stream.write(`  ${text}\n`);
    return {
      update(t: string) {
        stream.write(`  ${t}\n`);
      },
      succeed(t?: string) {
        if (t) stream.write(`  ✔ ${t}\n`);
      },
      fail(t?: string) {
        if (t) stream.write(`  ✖ ${t}\n`);
      },
      stop() {
        // no-op for static mode
      },
    };
  }

  const spinner: Ora = ora({ text, stream, spinner: 'dots', indent: 2, isEnabled: true }).start();

  return {
    update(t: string) {
      spinner.text = t;
    },
    succeed(t?: string) {
      spinner.succeed(t ?? spinner.text);
    },
    fail(t?: string) {
      spinner.fail(t ?? spinner.text);
    },
    stop() {
      spinner.stop();
    },
  };
}

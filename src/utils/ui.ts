import ora, { type Ora } from "ora";

let activeSpinner: Ora | null = null;

/** Start a spinner for a blocking wait. Replaces any active spinner. */
function startSpinner(text: string): void {
  activeSpinner?.stop();
  activeSpinner = ora({
    text,
    stream: process.stderr,
    // Disabled on non-TTY so CI logs stay line-oriented
    isEnabled: process.stderr.isTTY === true,
  }).start();
}

function succeedSpinner(text?: string): void {
  if (activeSpinner) {
    activeSpinner.succeed(text);
    activeSpinner = null;
  }
}

function failSpinner(text?: string): void {
  if (activeSpinner) {
    activeSpinner.fail(text);
    activeSpinner = null;
  }
}

/** Stop the spinner while something else writes to the terminal. Returns resume function. */
export function pauseSpinner(): (() => void) | null {
  if (!activeSpinner) return null;
  const spinner = activeSpinner;
  spinner.stop();
  return () => {
    spinner.start();
  };
}

/**
 * Run `task` behind a spinner. The spinner succeeds with `doneText` when the
 * task resolves and fails when it throws; the error is rethrown.
 */
export async function withSpinner<T>(
  text: string,
  task: () => Promise<T>,
  doneText?: string
): Promise<T> {
  startSpinner(text);
  try {
    const result = await task();
    succeedSpinner(doneText);
    return result;
  } catch (err) {
    failSpinner();
    throw err;
  }
}

import ora from 'ora';
import { getLogLevel } from './output.js';

/**
 * Runs `fn` behind a spinner. Falls back to plain output when stdout is not
 * a terminal or debug logging would interleave with the spinner frames.
 */
export async function withSpinner<T>(
  text: string,
  fn: () => Promise<T>,
): Promise<T> {
  const spinner = ora({ text, isEnabled: process.stdout.isTTY === true && getLogLevel() !== 'debug' }).start();
  try {
    const result = await fn();
    spinner.succeed();
    return result;
  } catch (err) {
    spinner.fail();
    throw err;
  }
}

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { CommandError } from '../core/errors.js';

const execFileAsync = promisify(execFile);

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string | undefined>;
}

function hasStderr(err: unknown): err is { stderr: string } {
  return typeof err === 'object' && err !== null && 'stderr' in err && typeof err.stderr === 'string';
}

/**
 * Runs a command without a shell and resolves with its stdout. A non-zero
 * exit becomes a {@link CommandError} carrying stderr.
 */
export async function run(command: string, args: string[], opts: ExecOptions = {}): Promise<string> {
  try {
    const { stdout } = await execFileAsync(command, args, {
      cwd: opts.cwd,
      env: opts.env ? { ...process.env, ...opts.env } : process.env,
      maxBuffer: 64 * 1024 * 1024,
      windowsHide: true,
    });
    return stdout;
  } catch (err) {
    const detail = hasStderr(err) && err.stderr.trim() ? err.stderr.trim() : String(err);
    throw new CommandError([command, ...args].join(' '), detail, { cause: err });
  }
}

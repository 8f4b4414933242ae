import { debug, info } from '../ui/output.js';
import { FailedToRemoveError } from '../core/errors.js';
import { isWindowsHost, type HostTriple } from '../core/host-triple.js';
import { getDistPath, type Layout } from '../core/paths.js';
import type { Toolbox } from '../types/toolchain.js';

/** What every component operation needs besides the component itself. */
export interface ToolchainContext {
  toolbox: Toolbox;
  layout: Layout;
}

export function exportVar(host: HostTriple, name: string, value: string): string {
  return isWindowsHost(host) ? `$Env:${name}="${value}"` : `export ${name}="${value}"`;
}

export function prependPath(host: HostTriple, dir: string): string {
  return isWindowsHost(host) ? `$Env:PATH = "${dir};" + $Env:PATH` : `export PATH="${dir}:$PATH"`;
}

/**
 * Removes a directory tree. Absent paths succeed; any other failure carries
 * the manual-cleanup guidance.
 */
export async function removeDirOrFail(toolbox: Toolbox, path: string): Promise<void> {
  if (!(await toolbox.pathExists(path))) {
    debug(`Nothing to remove at ${path}`);
    return;
  }
  try {
    await toolbox.removeDir(path);
  } catch (err) {
    throw new FailedToRemoveError(path, { cause: err });
  }
}

export async function removeFileOrFail(toolbox: Toolbox, path: string): Promise<void> {
  if (!(await toolbox.pathExists(path))) {
    debug(`Nothing to remove at ${path}`);
    return;
  }
  try {
    await toolbox.removeFile(path);
  } catch (err) {
    throw new FailedToRemoveError(path, { cause: err });
  }
}

export async function clearDistFolder({ toolbox, layout }: ToolchainContext): Promise<void> {
  const dist = getDistPath(layout);
  if (await toolbox.pathExists(dist)) {
    info('Clearing dist folder');
    await removeDirOrFail(toolbox, dist);
  }
}

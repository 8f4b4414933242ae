import { getCargoBinPath } from '../core/paths.js';
import type { CrateComponent } from '../types/toolchain.js';
import { debug, info, warn } from '../ui/output.js';
import { exeSuffix } from '../utils/platform.js';
import type { ToolchainContext } from './helpers.js';

/** Always installed alongside ESP-IDF, which links through it. */
export const LDPROXY = 'ldproxy';

/**
 * Parses a comma or space separated crate list. Empty tokens are dropped and
 * duplicates collapse.
 */
export function parseCrates(input: string): Set<string> {
  return new Set(input.split(/[\s,]+/).filter((c) => c.length > 0));
}

export function createCrate(name: string): CrateComponent {
  return { kind: 'crate', name };
}

export async function installCrate({ name }: CrateComponent, { toolbox, layout }: ToolchainContext): Promise<string[]> {
  if (await toolbox.pathExists(getCargoBinPath(layout, `${name}${exeSuffix()}`))) {
    warn(`Crate '${name}' is already installed, skipping`);
    return [];
  }
  info(`Installing crate '${name}'`);
  await toolbox.run('cargo', ['install', name]);
  return [];
}

export async function uninstallCrate(name: string, { toolbox, layout }: ToolchainContext): Promise<void> {
  if (!(await toolbox.pathExists(getCargoBinPath(layout, `${name}${exeSuffix()}`)))) {
    debug(`Crate '${name}' is not installed`);
    return;
  }
  info(`Uninstalling crate '${name}'`);
  await toolbox.run('cargo', ['uninstall', name]);
}

import { CommandError } from '../core/errors.js';
import type { RiscvTargetComponent } from '../types/toolchain.js';
import { debug, info } from '../ui/output.js';
import type { ToolchainContext } from './helpers.js';

export const RISCV_RUST_TARGETS = ['riscv32imc-unknown-none-elf', 'riscv32imac-unknown-none-elf'];

export function createRiscvTarget(nightlyVersion: string): RiscvTargetComponent {
  return { kind: 'riscv-target', nightlyVersion };
}

export async function installRiscvTarget(
  { nightlyVersion }: RiscvTargetComponent,
  { toolbox }: ToolchainContext,
): Promise<string[]> {
  info(`Installing RISC-V targets for '${nightlyVersion}' toolchain`);
  await toolbox.run('rustup', ['component', 'add', 'rust-src', '--toolchain', nightlyVersion]);
  await toolbox.run('rustup', ['target', 'add', '--toolchain', nightlyVersion, ...RISCV_RUST_TARGETS]);
  return [];
}

/** Removes whichever RISC-V targets are still installed on the toolchain. */
export async function uninstallRiscvTarget(nightlyVersion: string, { toolbox }: ToolchainContext): Promise<void> {
  info(`Uninstalling RISC-V targets for '${nightlyVersion}' toolchain`);
  let listed: string;
  try {
    listed = await toolbox.run('rustup', ['target', 'list', '--installed', '--toolchain', nightlyVersion]);
  } catch (err) {
    if (!(err instanceof CommandError)) throw err;
    debug(`Toolchain '${nightlyVersion}' is not available, no targets to remove: ${err.message}`);
    return;
  }

  const installed = new Set(listed.split(/\r?\n/).map((l) => l.trim()));
  const present = RISCV_RUST_TARGETS.filter((t) => installed.has(t));
  if (present.length === 0) return;
  await toolbox.run('rustup', ['target', 'remove', '--toolchain', nightlyVersion, ...present]);
}

import { join } from 'node:path';
import { isWindowsHost, type HostTriple } from '../core/host-triple.js';
import { getToolPath, type Layout } from '../core/paths.js';
import type { Target } from '../core/targets.js';
import type { GccComponent, GccFlavor } from '../types/toolchain.js';
import { info, warn } from '../ui/output.js';
import { prependPath, removeDirOrFail, type ToolchainContext } from './helpers.js';

export const GCC_REPOSITORY = 'https://github.com/espressif/crosstool-NG/releases/download';
export const GCC_RELEASE = '12.2.0_20230208';

export function gccFlavorFor(target: Target): GccFlavor {
  switch (target) {
    case 'esp32':
      return 'xtensa-esp32';
    case 'esp32s2':
      return 'xtensa-esp32s2';
    case 'esp32s3':
      return 'xtensa-esp32s3';
    case 'esp32c2':
    case 'esp32c3':
      return 'riscv32';
  }
}

export function gccToolchainName(flavor: GccFlavor): string {
  return flavor === 'riscv32' ? 'riscv32-esp-elf' : `${flavor}-elf`;
}

/** Host label used in crosstool-NG asset names. */
export function gccHost(triple: HostTriple): string {
  switch (triple) {
    case 'x86_64-unknown-linux-gnu':
      return 'x86_64-linux-gnu';
    case 'aarch64-unknown-linux-gnu':
      return 'aarch64-linux-gnu';
    case 'x86_64-pc-windows-msvc':
    case 'x86_64-pc-windows-gnu':
      return 'x86_64-w64-mingw32';
    case 'x86_64-apple-darwin':
    case 'aarch64-apple-darwin':
      return triple;
  }
}

export function createGcc(flavor: GccFlavor, hostTriple: HostTriple, layout: Layout): GccComponent {
  const toolchainName = gccToolchainName(flavor);
  const ext = isWindowsHost(hostTriple) ? 'zip' : 'tar.xz';
  const file = `${toolchainName}-${GCC_RELEASE}-${gccHost(hostTriple)}.${ext}`;
  return {
    kind: 'gcc',
    flavor,
    toolchainName,
    hostTriple,
    path: join(getToolPath(layout, toolchainName), `esp-${GCC_RELEASE}`),
    url: `${GCC_REPOSITORY}/esp-${GCC_RELEASE}/${file}`,
  };
}

export async function installGcc(gcc: GccComponent, { toolbox }: ToolchainContext): Promise<string[]> {
  const ext = isWindowsHost(gcc.hostTriple) ? 'zip' : 'tar.xz';
  if (await toolbox.pathExists(gcc.path)) {
    warn(`Previous installation of GCC exists in: '${gcc.path}'. Reusing this installation.`);
  } else {
    info(`Installing GCC (${gcc.toolchainName})`);
    await toolbox.download(gcc.url, gcc.path, { fileName: `${gcc.toolchainName}.${ext}`, extract: true });
  }
  return [prependPath(gcc.hostTriple, `${gcc.path}/${gcc.toolchainName}/bin`)];
}

export async function uninstallGcc(flavor: GccFlavor, { toolbox, layout }: ToolchainContext): Promise<void> {
  const name = gccToolchainName(flavor);
  info(`Deleting GCC (${name})`);
  await removeDirOrFail(toolbox, getToolPath(layout, name));
}

import { dirname, join } from 'node:path';
import { InvalidOptionError } from '../core/errors.js';
import { espressifArch, isWindowsHost, type HostTriple } from '../core/host-triple.js';
import { getToolPath, type Layout } from '../core/paths.js';
import type { LlvmComponent } from '../types/toolchain.js';
import { info, warn } from '../ui/output.js';
import { exportVar, prependPath, removeDirOrFail, type ToolchainContext } from './helpers.js';

export const LLVM_REPOSITORY = 'https://github.com/espressif/llvm-project/releases/download';
export const CLANG_TOOL = 'xtensa-esp32-elf-clang';
export const DEFAULT_LLVM_VERSION = '15';

const LLVM_RELEASES: Record<string, string> = {
  '15': 'esp-15.0.0-20221201',
  '16': 'esp-16.0.4-20231113',
};

export const SUPPORTED_LLVM_VERSIONS = Object.keys(LLVM_RELEASES);

export function createLlvm(
  major: string,
  minimal: boolean,
  hostTriple: HostTriple,
  layout: Layout,
): LlvmComponent {
  const version = LLVM_RELEASES[major];
  if (!version) {
    throw new InvalidOptionError(
      `LLVM version '${major}' is not supported, expected one of: ${SUPPORTED_LLVM_VERSIONS.join(', ')}`,
    );
  }
  const file = `llvm-${version}-${espressifArch(hostTriple)}.tar.xz`;
  const fileName = minimal ? `libs_${file}` : file;
  return {
    kind: 'llvm',
    version,
    minimal,
    hostTriple,
    path: join(getToolPath(layout, CLANG_TOOL), `${version}-${hostTriple}`),
    url: `${LLVM_REPOSITORY}/${version}/${fileName}`,
  };
}

export function llvmExports(llvm: LlvmComponent): string[] {
  const bin = `${llvm.path}/esp-clang/bin`;
  if (isWindowsHost(llvm.hostTriple)) {
    return [exportVar(llvm.hostTriple, 'LIBCLANG_PATH', `${bin}/libclang.dll`), prependPath(llvm.hostTriple, bin)];
  }
  const exports = [exportVar(llvm.hostTriple, 'LIBCLANG_PATH', `${llvm.path}/esp-clang/lib`)];
  if (!llvm.minimal) {
    exports.push(exportVar(llvm.hostTriple, 'CLANG_PATH', `${bin}/clang`));
  }
  return exports;
}

export async function installLlvm(llvm: LlvmComponent, { toolbox }: ToolchainContext): Promise<string[]> {
  if (await toolbox.pathExists(llvm.path)) {
    warn(`Previous installation of LLVM exists in: '${llvm.path}'. Reusing this installation.`);
  } else {
    info(`Installing Xtensa LLVM ${llvm.version}`);
    await toolbox.download(llvm.url, llvm.path, { fileName: 'idf_tool_xtensa_elf_clang.tar.xz', extract: true });
  }
  return llvmExports(llvm);
}

/** Removes every LLVM build under the clang tool directory holding `llvmPath`. */
export async function uninstallLlvm(llvmPath: string, { toolbox }: ToolchainContext): Promise<void> {
  info('Deleting Xtensa LLVM');
  await removeDirOrFail(toolbox, dirname(llvmPath));
}

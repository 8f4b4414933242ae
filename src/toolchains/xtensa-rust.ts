import { join } from 'node:path';
import { ToolchainAlreadyInstalledError } from '../core/errors.js';
import { isWindowsHost, type HostTriple } from '../core/host-triple.js';
import { getDistPath, type Layout } from '../core/paths.js';
import type { XtensaRustComponent } from '../types/toolchain.js';
import { info } from '../ui/output.js';
import { removeDirOrFail, type ToolchainContext } from './helpers.js';

export const XTENSA_RUST_REPOSITORY = 'https://github.com/esp-rs/rust-build/releases/download';

export function xtensaRustPath(layout: Layout): string {
  return join(layout.rustupHome, 'toolchains', 'esp');
}

export function createXtensaRust(version: string, hostTriple: HostTriple, layout: Layout): XtensaRustComponent {
  const ext = isWindowsHost(hostTriple) ? 'zip' : 'tar.xz';
  const base = `${XTENSA_RUST_REPOSITORY}/v${version}`;
  return {
    kind: 'xtensa-rust',
    version,
    hostTriple,
    path: xtensaRustPath(layout),
    distUrl: `${base}/rust-${version}-${hostTriple}.${ext}`,
    srcDistUrl: `${base}/rust-src-${version}.${ext}`,
  };
}

export async function installXtensaRust(
  rust: XtensaRustComponent,
  { toolbox, layout }: ToolchainContext,
): Promise<string[]> {
  if (await toolbox.pathExists(rust.path)) {
    throw new ToolchainAlreadyInstalledError(rust.path);
  }
  info(`Installing Xtensa Rust ${rust.version} toolchain`);

  if (isWindowsHost(rust.hostTriple)) {
    await toolbox.download(rust.distUrl, rust.path, { fileName: 'rust.zip', extract: true });
    await toolbox.download(rust.srcDistUrl, rust.path, { fileName: 'rust-src.zip', extract: true });
    return [];
  }

  const tmp = getDistPath(layout, `xtensa-rust-${rust.version}`);
  try {
    await toolbox.download(rust.distUrl, tmp, { fileName: 'rust.tar.xz', extract: true });
    await toolbox.run(
      'bash',
      ['install.sh', `--destdir=${rust.path}`, '--prefix=', '--without=rust-docs-json-preview,rust-docs'],
      { cwd: join(tmp, `rust-${rust.version}-${rust.hostTriple}`) },
    );

    await toolbox.download(rust.srcDistUrl, tmp, { fileName: 'rust-src.tar.xz', extract: true });
    await toolbox.run(
      'bash',
      ['install.sh', `--destdir=${rust.path}`, '--prefix=', '--without=rust-docs-json-preview'],
      { cwd: join(tmp, `rust-src-${rust.version}`) },
    );
  } finally {
    await toolbox.removeDir(tmp);
  }
  return [];
}

export async function uninstallXtensaRust(path: string, { toolbox }: ToolchainContext): Promise<void> {
  info('Deleting Xtensa Rust toolchain');
  await removeDirOrFail(toolbox, path);
}

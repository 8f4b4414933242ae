import { basename, join } from 'node:path';
import sevenBin from '7zip-bin';
import Seven from 'node-7z';
import StreamZip from 'node-stream-zip';
import { UnsupportedArchiveError } from '../core/errors.js';
import { ensureDir, removePath } from './fs.js';
import { run } from './exec.js';
import { isWindows } from './platform.js';

export function archiveFormat(file: string): 'zip' | 'tar' | null {
  const lower = file.toLowerCase();
  if (lower.endsWith('.zip')) return 'zip';
  if (lower.endsWith('.tar.gz') || lower.endsWith('.tar.xz') || lower.endsWith('.tgz') || lower.endsWith('.tar')) {
    return 'tar';
  }
  return null;
}

/**
 * Name of the plain tar 7z leaves behind when it unpacks a compressed
 * tarball, or null when `file` is not compressed.
 */
export function innerTarName(file: string): string | null {
  const name = basename(file);
  const lower = name.toLowerCase();
  if (lower.endsWith('.tar.gz') || lower.endsWith('.tar.xz')) return name.slice(0, -3);
  if (lower.endsWith('.tgz')) return `${name.slice(0, -4)}.tar`;
  return null;
}

export async function extractZip(source: string, destination: string): Promise<void> {
  const zip = new StreamZip.async({ file: source });
  try {
    await zip.extract(null, destination);
  } finally {
    await zip.close();
  }
}

export function extract7z(source: string, destination: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const stream = Seven.extractFull(source, destination, { $bin: sevenBin.path7za });
    stream.on('error', reject);
    stream.on('end', () => resolve());
  });
}

export async function extractTar(source: string, destination: string, windows: boolean = isWindows): Promise<void> {
  if (!windows) {
    await run('tar', ['-xf', source, '-C', destination]);
    return;
  }
  // 7z peels one layer at a time: the compressed stream first, then the tar.
  await extract7z(source, destination);
  const inner = innerTarName(source);
  if (inner) {
    const tarball = join(destination, inner);
    await extract7z(tarball, destination);
    await removePath(tarball);
  }
}

export async function extractArchive(source: string, destination: string): Promise<void> {
  ensureDir(destination);
  switch (archiveFormat(source)) {
    case 'zip':
      await extractZip(source, destination);
      return;
    case 'tar':
      await extractTar(source, destination);
      return;
    case null:
      throw new UnsupportedArchiveError(source);
  }
}

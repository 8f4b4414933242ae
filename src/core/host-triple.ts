import { UnsupportedHostTripleError } from './errors.js';

export const HOST_TRIPLES = [
  'x86_64-unknown-linux-gnu',
  'aarch64-unknown-linux-gnu',
  'x86_64-pc-windows-msvc',
  'x86_64-pc-windows-gnu',
  'x86_64-apple-darwin',
  'aarch64-apple-darwin',
] as const;

export type HostTriple = (typeof HOST_TRIPLES)[number];

export function parseHostTriple(s: string): HostTriple | null {
  return HOST_TRIPLES.find((t) => t === s) ?? null;
}

export function guessHostTriple(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch,
): string {
  switch (platform) {
    case 'linux':
      return `${arch === 'arm64' ? 'aarch64' : arch === 'x64' ? 'x86_64' : arch}-unknown-linux-gnu`;
    case 'darwin':
      return `${arch === 'arm64' ? 'aarch64' : arch === 'x64' ? 'x86_64' : arch}-apple-darwin`;
    case 'win32':
      return `${arch === 'x64' ? 'x86_64' : arch}-pc-windows-msvc`;
    default:
      return `${arch}-unknown-${platform}`;
  }
}

/**
 * Resolves the host triple once per invocation, from the explicit value when
 * given, otherwise from the running platform.
 */
export function getHostTriple(explicit?: string): HostTriple {
  const candidate = explicit ?? guessHostTriple();
  const triple = parseHostTriple(candidate);
  if (!triple) throw new UnsupportedHostTripleError(candidate);
  return triple;
}

export function isWindowsHost(triple: HostTriple): boolean {
  return triple.includes('windows');
}

/** Artifact architecture label used by Espressif release assets. */
export function espressifArch(triple: HostTriple): string {
  switch (triple) {
    case 'x86_64-unknown-linux-gnu':
      return 'linux-amd64';
    case 'aarch64-unknown-linux-gnu':
      return 'linux-arm64';
    case 'x86_64-apple-darwin':
      return 'macos';
    case 'aarch64-apple-darwin':
      return 'macos-arm64';
    case 'x86_64-pc-windows-msvc':
    case 'x86_64-pc-windows-gnu':
      return 'win64';
  }
}

import { mkdirSync } from 'node:fs';
import { access, rm } from 'node:fs/promises';

export function ensureDir(path: string, mode?: number): void {
  mkdirSync(path, { recursive: true, mode });
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Removes a file or directory tree; succeeds when nothing is there. */
export async function removePath(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

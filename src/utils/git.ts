import { rename } from 'node:fs/promises';
import { simpleGit } from 'simple-git';
import type { GitRef } from '../core/versions.js';
import { removePath } from './fs.js';

/**
 * Checks out `ref` of `url` into `destDir`. Branches and tags are cloned
 * shallowly; a commit needs the history to reach it. The clone lands in a
 * sibling temp directory and is renamed into place once complete.
 */
export async function cloneAt(url: string, destDir: string, ref: GitRef): Promise<void> {
  const tmpDir = `${destDir}.tmp`;
  await removePath(tmpDir);

  const git = simpleGit();
  if (ref.kind === 'commit') {
    await git.clone(url, tmpDir);
    const repo = simpleGit(tmpDir);
    await repo.checkout(ref.name);
    await repo.submoduleUpdate(['--init', '--recursive', '--depth', '1']);
  } else {
    await git.clone(url, tmpDir, [
      '--depth', '1',
      '--branch', ref.name,
      '--recurse-submodules',
      '--shallow-submodules',
    ]);
  }

  await removePath(destDir);
  await rename(tmpDir, destDir);
}

import { unlink } from 'node:fs/promises';
import type { Toolbox } from '../types/toolchain.js';
import { debug } from '../ui/output.js';
import { downloadFile } from '../utils/download.js';
import { run } from '../utils/exec.js';
import { pathExists, removePath } from '../utils/fs.js';
import { cloneAt } from '../utils/git.js';

/** Toolbox backed by the network, the filesystem and real subprocesses. */
export function createNodeToolbox(): Toolbox {
  return {
    async download(url, destDir, { fileName, extract }) {
      debug(`Downloading ${url} to ${destDir}`);
      return downloadFile(url, fileName, destDir, extract);
    },
    async run(command, args, opts) {
      debug(`Running: ${command} ${args.join(' ')}`);
      return run(command, args, opts);
    },
    async clone(url, destDir, ref) {
      debug(`Cloning ${url} (${ref.kind} ${ref.name}) into ${destDir}`);
      await cloneAt(url, destDir, ref);
    },
    pathExists,
    removeDir: removePath,
    async removeFile(path) {
      await unlink(path);
    },
  };
}

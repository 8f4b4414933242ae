import { mkdirSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import { info, warn } from '../ui/output.js';
import { isWindows, toWindowsSeparators } from '../utils/platform.js';

export interface ExportFileOptions {
  cwd?: string;
  home?: string;
  windows?: boolean;
}

export function defaultExportFileName(windows: boolean = isWindows): string {
  return windows ? 'export-esp.ps1' : 'export-esp.sh';
}

/**
 * Absolute path of the export file. Relative paths are taken from `cwd`;
 * without a path the default script goes in the home directory.
 */
export function resolveExportFile(path?: string, opts: ExportFileOptions = {}): string {
  if (path) {
    return isAbsolute(path) ? path : resolve(opts.cwd ?? process.cwd(), path);
  }
  return join(opts.home ?? homedir(), defaultExportFileName(opts.windows));
}

export function renderExports(lines: readonly string[], windows: boolean = isWindows): string {
  return lines.map((line) => `${windows ? toWindowsSeparators(line) : line}\n`).join('');
}

export function writeExportFile(path: string, lines: readonly string[], windows: boolean = isWindows): void {
  info('Creating export file');
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, renderExports(lines, windows), 'utf-8');
  warn(`Set up the environment variables by running: '${windows ? path : `. ${path}`}'`);
  warn('This step must be done every time you open a new terminal.');
}

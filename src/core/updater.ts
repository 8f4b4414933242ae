import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { APP_NAME, NPM_PACKAGE } from '../config/branding.js';
import { debug, warn } from '../ui/output.js';
import { run } from '../utils/exec.js';

const PackageJsonSchema = z.object({ name: z.string(), version: z.string() });

/** Version from the package.json that ships with the CLI. */
export function currentVersion(from: string = fileURLToPath(import.meta.url)): string {
  let dir = dirname(from);
  for (;;) {
    try {
      const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(join(dir, 'package.json'), 'utf-8')));
      if (parsed.success && parsed.data.name === NPM_PACKAGE) return parsed.data.version;
    } catch (err) {
      debug(`No package.json in ${dir}: ${String(err)}`);
    }
    const parent = dirname(dir);
    if (parent === dir) return 'dev';
    dir = parent;
  }
}

/** True when `candidate` is a strictly higher `x.y.z` release than `current`. */
export function isNewerVersion(candidate: string, current: string): boolean {
  const parse = (v: string) => v.replace(/^v/, '').split(/[.-]/).slice(0, 3).map((p) => Number.parseInt(p, 10));
  const a = parse(candidate);
  const b = parse(current);
  if (a.some(Number.isNaN) || b.some(Number.isNaN)) return false;
  for (let i = 0; i < 3; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    if (x !== y) return x > y;
  }
  return false;
}

export type VersionLookup = () => Promise<string>;

const npmLatest: VersionLookup = async () => (await run('npm', ['view', NPM_PACKAGE, 'version'])).trim();

/**
 * Looks up the newest published release. Resolves with it when it is newer
 * than `current`, with null otherwise or when the registry can't be reached.
 */
export async function checkForUpdate(current: string, lookup: VersionLookup = npmLatest): Promise<string | null> {
  try {
    const latest = await lookup();
    return latest && isNewerVersion(latest, current) ? latest : null;
  } catch (err) {
    debug(`Update check failed: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

export async function notifyUpdate(current: string = currentVersion(), lookup?: VersionLookup): Promise<void> {
  const latest = await checkForUpdate(current, lookup);
  if (latest) {
    warn(`A new version of ${APP_NAME} is available: ${current} → ${latest}`);
    warn(`Run 'npm install -g ${NPM_PACKAGE}' to update.`);
  }
}

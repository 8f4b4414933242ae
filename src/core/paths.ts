import { homedir } from 'node:os';
import { join } from 'node:path';
import { HOME_DIR, envVar } from '../config/branding.js';

// ── File and directory names ────────────────────────────────────────

const STATE_FILE = 'state.json';
const SETTINGS_FILE = 'settings.yaml';
const ESPRESSIF_DIR = '.espressif';
const TOOLS_DIR = 'tools';
const DIST_DIR = 'dist';
const FRAMEWORKS_DIR = 'frameworks';

/**
 * Every location the installer reads or writes. Resolved once per invocation
 * and passed down explicitly, so tests can point the whole tree at a
 * temporary directory.
 */
export interface Layout {
  /** Per-user configuration directory holding the state and settings files. */
  home: string;
  statePath: string;
  settingsPath: string;
  /** Root of the Espressif tools tree (`IDF_TOOLS_PATH`). */
  toolsRoot: string;
  rustupHome: string;
  cargoHome: string;
}

type Env = Record<string, string | undefined>;

export function resolveLayout(env: Env = process.env, home: string = homedir()): Layout {
  const configHome = env[envVar('HOME')] ?? join(home, HOME_DIR);
  return {
    home: configHome,
    statePath: join(configHome, STATE_FILE),
    settingsPath: join(configHome, SETTINGS_FILE),
    toolsRoot: env.IDF_TOOLS_PATH ?? join(home, ESPRESSIF_DIR),
    rustupHome: env.RUSTUP_HOME ?? join(home, '.rustup'),
    cargoHome: env.CARGO_HOME ?? join(home, '.cargo'),
  };
}

/** Layout rooted entirely under one directory. */
export function layoutUnder(root: string): Layout {
  return resolveLayout({}, root);
}

export function getToolPath(layout: Layout, tool: string): string {
  return join(layout.toolsRoot, TOOLS_DIR, tool);
}

export function getDistPath(layout: Layout, file = ''): string {
  return file ? join(layout.toolsRoot, DIST_DIR, file) : join(layout.toolsRoot, DIST_DIR);
}

export function getFrameworksPath(layout: Layout): string {
  return join(layout.toolsRoot, FRAMEWORKS_DIR);
}

export function getCargoBinPath(layout: Layout, name: string): string {
  return join(layout.cargoHome, 'bin', name);
}

import { readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import yaml from 'js-yaml';
import { SettingsSchema, type SettingKey } from './schema.js';
import type { Settings } from '../types/state.js';
import { warn } from '../ui/output.js';

let settingsPath = '';
let settingsData: Settings = {};

function readSettings(path: string): Settings {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch {
    return {};
  }
  const parsed = SettingsSchema.safeParse(yaml.load(raw) ?? {});
  if (!parsed.success) {
    warn(`Ignoring invalid settings file ${path}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    return {};
  }
  return parsed.data;
}

export function init(path: string): void {
  settingsPath = path;
  settingsData = readSettings(path);
}

export function get(key: SettingKey): string | undefined {
  return settingsData[key];
}

export function set(key: SettingKey, value: string): void {
  settingsData = SettingsSchema.parse({ ...settingsData, [key]: value });
  mkdirSync(dirname(settingsPath), { recursive: true });
  writeFileSync(settingsPath, yaml.dump(settingsData), 'utf-8');
}

export function all(): Settings {
  return { ...settingsData };
}

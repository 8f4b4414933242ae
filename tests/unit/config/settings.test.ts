import { describe, it, expect, afterEach } from 'vitest';
import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import * as settings from '../../../src/config/settings.js';

describe('settings', () => {
  const dir = join(tmpdir(), `espforge-settings-test-${Date.now()}`);
  const path = join(dir, 'settings.yaml');

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('starts empty without a file', () => {
    settings.init(path);
    expect(settings.all()).toEqual({});
    expect(settings.get('targets')).toBeUndefined();
  });

  it('writes values as YAML and reads them back', () => {
    settings.init(path);
    settings.set('targets', 'esp32c3');
    expect(readFileSync(path, 'utf-8')).toBe('targets: esp32c3\n');

    settings.init(path);
    expect(settings.get('targets')).toBe('esp32c3');
  });

  it('ignores an invalid file', () => {
    mkdirSync(dir, { recursive: true });
    writeFileSync(path, 'targets:\n  - esp32\n');
    settings.init(path);
    expect(settings.all()).toEqual({});
  });
});

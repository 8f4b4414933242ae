import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CorruptStateError, NoInstallationFoundError } from '../../../src/core/errors.js';
import { clearField, FileStateStore, serializeState } from '../../../src/core/state.js';
import type { PersistedState } from '../../../src/types/state.js';

const state: PersistedState = {
  hostTriple: 'x86_64-unknown-linux-gnu',
  targets: ['esp32c3', 'esp32'],
  xtensaRust: { version: '1.69.0.0', path: '/home/dev/.rustup/toolchains/esp' },
  llvmPath: '/home/dev/.espressif/tools/xtensa-esp32-elf-clang/esp-15.0.0-20221201-x86_64-unknown-linux-gnu',
  extraCrates: ['ldproxy', 'espflash'],
  exportFile: '/home/dev/export-esp.sh',
  nightlyVersion: 'nightly',
};

describe('FileStateStore', () => {
  let dir: string;
  let store: FileStateStore;

  beforeEach(() => {
    dir = join(tmpdir(), `espforge-state-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(dir, { recursive: true });
    store = new FileStateStore(join(dir, 'config', 'state.json'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reports a missing file as no installation', () => {
    expect(store.exists()).toBe(false);
    expect(() => store.load()).toThrow(NoInstallationFoundError);
    expect(store.tryLoad()).toBeNull();
  });

  it('saves and loads a record', () => {
    store.save(state);
    expect(store.load()).toEqual({
      ...state,
      targets: ['esp32', 'esp32c3'],
      extraCrates: ['espflash', 'ldproxy'],
    });
  });

  it('leaves no temporary file behind', () => {
    store.save(state);
    expect(existsSync(`${store.path}.tmp`)).toBe(false);
  });

  it('reports unparsable JSON as corrupt', () => {
    mkdirSync(join(dir, 'config'), { recursive: true });
    writeFileSync(store.path, '{ not json');
    expect(() => store.load()).toThrow(CorruptStateError);
  });

  it('reports an invalid field as corrupt', () => {
    mkdirSync(join(dir, 'config'), { recursive: true });
    writeFileSync(store.path, JSON.stringify({ hostTriple: 'x86_64-unknown-linux-gnu', targets: ['esp8266'] }));
    expect(() => store.load()).toThrow(/targets\.0/);
  });

  it('deletes the record and tolerates a second delete', () => {
    store.save(state);
    store.delete();
    expect(store.exists()).toBe(false);
    expect(() => store.delete()).not.toThrow();
  });
});

describe('serializeState', () => {
  it('writes sorted, indented JSON with a trailing newline', () => {
    const text = serializeState({ hostTriple: 'aarch64-apple-darwin', targets: ['esp32s3', 'esp32'] });
    expect(text).toBe('{\n  "hostTriple": "aarch64-apple-darwin",\n  "targets": [\n    "esp32",\n    "esp32s3"\n  ]\n}\n');
  });
});

describe('clearField', () => {
  it('returns a copy without the field', () => {
    const next = clearField(state, 'llvmPath');
    expect('llvmPath' in next).toBe(false);
    expect(state.llvmPath).toBeDefined();
    expect(next.exportFile).toBe(state.exportFile);
  });

  it('persists a cleared field as absent', () => {
    const dir = join(tmpdir(), `espforge-state-rt-${Date.now()}`);
    const store = new FileStateStore(join(dir, 'state.json'));
    try {
      store.save(clearField(state, 'xtensaRust'));
      expect(JSON.parse(readFileSync(store.path, 'utf-8')).xtensaRust).toBeUndefined();
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

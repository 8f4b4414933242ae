import { describe, it, expect } from 'vitest';
import { checkForUpdate, currentVersion, isNewerVersion } from '../../../src/core/updater.js';

describe('isNewerVersion', () => {
  it('compares release numbers', () => {
    expect(isNewerVersion('0.4.0', '0.3.0')).toBe(true);
    expect(isNewerVersion('0.3.10', '0.3.9')).toBe(true);
    expect(isNewerVersion('0.3.0', '0.3.0')).toBe(false);
    expect(isNewerVersion('0.2.9', '0.3.0')).toBe(false);
  });

  it('never reports an update for an unparsable version', () => {
    expect(isNewerVersion('1.0.0', 'dev')).toBe(false);
  });
});

describe('checkForUpdate', () => {
  it('returns a newer published release', async () => {
    expect(await checkForUpdate('0.3.0', async () => '0.4.0')).toBe('0.4.0');
  });

  it('returns null when current', async () => {
    expect(await checkForUpdate('0.4.0', async () => '0.4.0')).toBeNull();
  });

  it('returns null when the registry is unreachable', async () => {
    const lookup = async (): Promise<string> => {
      throw new Error('ENOTFOUND registry.npmjs.org');
    };
    expect(await checkForUpdate('0.3.0', lookup)).toBeNull();
  });
});

describe('currentVersion', () => {
  it('reads the version shipped with the package', () => {
    expect(currentVersion()).toBe('0.3.0');
  });
});

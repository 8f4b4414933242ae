import { describe, it, expect } from 'vitest';
import { UnsupportedHostTripleError } from '../../../src/core/errors.js';
import {
  espressifArch,
  getHostTriple,
  guessHostTriple,
  isWindowsHost,
} from '../../../src/core/host-triple.js';

describe('host triple', () => {
  it('guesses the triple from platform and arch', () => {
    expect(guessHostTriple('linux', 'x64')).toBe('x86_64-unknown-linux-gnu');
    expect(guessHostTriple('linux', 'arm64')).toBe('aarch64-unknown-linux-gnu');
    expect(guessHostTriple('darwin', 'arm64')).toBe('aarch64-apple-darwin');
    expect(guessHostTriple('win32', 'x64')).toBe('x86_64-pc-windows-msvc');
  });

  it('accepts an explicit supported triple', () => {
    expect(getHostTriple('x86_64-apple-darwin')).toBe('x86_64-apple-darwin');
  });

  it('rejects unsupported triples', () => {
    expect(() => getHostTriple('riscv64gc-unknown-linux-gnu')).toThrow(UnsupportedHostTripleError);
  });

  it('classifies hosts', () => {
    expect(isWindowsHost('x86_64-pc-windows-gnu')).toBe(true);
    expect(isWindowsHost('aarch64-apple-darwin')).toBe(false);
    expect(espressifArch('aarch64-unknown-linux-gnu')).toBe('linux-arm64');
    expect(espressifArch('x86_64-pc-windows-msvc')).toBe('win64');
  });
});

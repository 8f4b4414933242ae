import { describe, it, expect } from 'vitest';
import { ComponentInstallError, DownloadError } from '../../../src/core/errors.js';
import { executePlan } from '../../../src/core/executor.js';
import { createCrate } from '../../../src/toolchains/crates.js';
import type { Component } from '../../../src/types/toolchain.js';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

function crateName(component: Component): string {
  return component.kind === 'crate' ? component.name : component.kind;
}

describe('executePlan', () => {
  it('returns nothing for an empty plan', async () => {
    expect(await executePlan([], async () => ['export X="1"'])).toEqual([]);
  });

  it('aggregates exports in completion order', async () => {
    const delays: Record<string, number> = { a: 40, b: 0, c: 15 };
    const exports = await executePlan(['a', 'b', 'c'].map(createCrate), async (component) => {
      const name = crateName(component);
      await sleep(delays[name] ?? 0);
      return [`export ${name.toUpperCase()}="${name}"`];
    });
    expect(exports).toEqual(['export B="b"', 'export C="c"', 'export A="a"']);
  });

  it('returns exactly the union of every component export', async () => {
    const exports = await executePlan(['x', 'y'].map(createCrate), async (component) => {
      const name = crateName(component);
      return [`export ${name}1="1"`, `export ${name}2="2"`];
    });
    expect([...exports].sort()).toEqual(['export x1="1"', 'export x2="2"', 'export y1="1"', 'export y2="2"']);
  });

  it('runs every component concurrently', async () => {
    let active = 0;
    let peak = 0;
    await executePlan(['a', 'b', 'c', 'd'].map(createCrate), async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(10);
      active--;
      return [];
    });
    expect(peak).toBe(4);
  });

  it('fails with the first error and leaves siblings running', async () => {
    const finished: string[] = [];
    const result = executePlan(['a', 'b', 'c'].map(createCrate), async (component) => {
      const name = crateName(component);
      if (name === 'b') throw new Error('boom');
      await sleep(20);
      finished.push(name);
      return [];
    });

    await expect(result).rejects.toThrow(ComponentInstallError);
    await expect(result).rejects.toThrow('Failed to install crate b: boom');
    expect(finished).toEqual([]);

    await sleep(50);
    expect(finished.sort()).toEqual(['a', 'c']);
  });

  it('keeps the kind of a domain error', async () => {
    const result = executePlan([createCrate('a')], async () => {
      throw new DownloadError('https://example.invalid/a.tar.xz', 'connection reset');
    });
    await expect(result).rejects.toMatchObject({ kind: 'network-io', code: 'toolchain.download_failed' });
  });
});

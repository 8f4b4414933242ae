import { describeComponent } from '../toolchains/index.js';
import type { Component } from '../types/toolchain.js';
import { debug } from '../ui/output.js';
import { Channel } from './channel.js';
import { ComponentInstallError } from './errors.js';

export type InstallFn = (component: Component) => Promise<string[]>;

type Outcome =
  | { ok: true; component: Component; exports: string[] }
  | { ok: false; component: Component; error: unknown };

/**
 * Installs every component concurrently, one task each, and collects their
 * export lines in completion order.
 *
 * The first failure received is thrown as a {@link ComponentInstallError}.
 * Tasks still running are left to finish on their own: aborting a download
 * halfway leaves a worse partial state than letting it complete.
 */
export async function executePlan(components: readonly Component[], install: InstallFn): Promise<string[]> {
  if (components.length === 0) return [];

  // Sized to the plan so no producer ever waits on the consumer.
  const channel = new Channel<Outcome>(components.length);

  const task = async (component: Component): Promise<void> => {
    let outcome: Outcome;
    try {
      outcome = { ok: true, component, exports: await install(component) };
    } catch (error) {
      outcome = { ok: false, component, error };
    }
    await channel.send(outcome);
  };

  for (const component of components) {
    void task(component);
  }

  const exports: string[] = [];
  for (let received = 0; received < components.length; received++) {
    const outcome = await channel.recv();
    const name = describeComponent(outcome.component);
    if (!outcome.ok) {
      throw new ComponentInstallError(name, outcome.error);
    }
    debug(`${name} installed`);
    exports.push(...outcome.exports);
  }
  return exports;
}

import type { Command } from 'commander';
import { update } from '../core/orchestrator.js';
import { notifyUpdate } from '../core/updater.js';
import { info } from '../ui/output.js';
import { addLogLevelOption, applyLogLevel, createDeps, exitWithError, type LogLevelOptions } from './shared.js';

interface UpdateCommandOptions extends LogLevelOptions {
  defaultHost?: string;
  toolchainVersion?: string;
}

export function registerUpdate(program: Command): void {
  const cmd = program
    .command('update')
    .description('Update the Xtensa Rust toolchain')
    .option('-d, --default-host <triple>', 'Target triple of the host')
    .option('-v, --toolchain-version <version>', 'Xtensa Rust toolchain version');

  addLogLevelOption(cmd).action(async (opts: UpdateCommandOptions) => {
    try {
      applyLogLevel(opts);
      const deps = createDeps();
      await notifyUpdate();

      info('Updating the Xtensa Rust toolchain');
      await update({ hostTriple: opts.defaultHost, toolchainVersion: opts.toolchainVersion }, deps);
    } catch (err) {
      exitWithError(err);
    }
  });
}

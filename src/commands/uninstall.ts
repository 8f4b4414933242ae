import type { Command } from 'commander';
import { uninstall } from '../core/orchestrator.js';
import { notifyUpdate } from '../core/updater.js';
import { info } from '../ui/output.js';
import { askConfirm } from '../ui/prompts.js';
import { addLogLevelOption, applyLogLevel, createDeps, exitWithError, type LogLevelOptions } from './shared.js';

interface UninstallCommandOptions extends LogLevelOptions {
  yes?: boolean;
}

export function registerUninstall(program: Command): void {
  const cmd = program
    .command('uninstall')
    .description('Remove everything a previous install put in place')
    .option('-y, --yes', 'Skip confirmation prompt');

  addLogLevelOption(cmd).action(async (opts: UninstallCommandOptions) => {
    try {
      applyLogLevel(opts);
      const deps = createDeps();
      await notifyUpdate();

      if (!opts.yes && process.stdin.isTTY && deps.store.exists()) {
        const confirmed = await askConfirm('Remove every installed toolchain?', false);
        if (!confirmed) {
          console.log('Cancelled.');
          return;
        }
      }

      info('Uninstalling the Rust environment for Espressif chips');
      await uninstall(deps);
    } catch (err) {
      exitWithError(err);
    }
  });
}

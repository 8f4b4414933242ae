import type { Command } from 'commander';
import { resolveLayout } from '../core/paths.js';
import { FileStateStore } from '../core/state.js';
import { formatTargets } from '../core/targets.js';
import type { PersistedState } from '../types/state.js';
import { info } from '../ui/output.js';
import { printTable } from '../ui/table.js';
import { addLogLevelOption, applyLogLevel, exitWithError, type LogLevelOptions } from './shared.js';

interface StatusCommandOptions extends LogLevelOptions {
  json?: boolean;
}

export function statusRows(state: PersistedState): string[][] {
  const rows = [
    ['Host triple', state.hostTriple],
    ['Targets', formatTargets(state.targets) || '-'],
  ];
  if (state.xtensaRust) rows.push(['Xtensa Rust', `${state.xtensaRust.version} (${state.xtensaRust.path})`]);
  if (state.llvmPath) rows.push(['LLVM', state.llvmPath]);
  if (state.nightlyVersion) rows.push(['Nightly toolchain', state.nightlyVersion]);
  if (state.espIdfVersion) rows.push(['ESP-IDF', state.espIdfVersion]);
  if (state.extraCrates?.length) rows.push(['Extra crates', state.extraCrates.join(', ')]);
  if (state.exportFile) rows.push(['Export file', state.exportFile]);
  return rows;
}

export function registerStatus(program: Command): void {
  const cmd = program
    .command('status')
    .description('Show what is currently installed')
    .option('--json', 'Output as JSON');

  addLogLevelOption(cmd).action((opts: StatusCommandOptions) => {
    try {
      applyLogLevel(opts);
      const store = new FileStateStore(resolveLayout().statePath);
      const state = store.tryLoad();

      if (opts.json) {
        console.log(JSON.stringify(state, null, 2));
        return;
      }
      if (!state) {
        info('Nothing is installed.');
        return;
      }
      printTable(['Component', 'Value'], statusRows(state));
    } catch (err) {
      exitWithError(err);
    }
  });
}

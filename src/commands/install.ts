import type { Command } from 'commander';
import * as settings from '../config/settings.js';
import { install } from '../core/orchestrator.js';
import { notifyUpdate } from '../core/updater.js';
import { DEFAULT_LLVM_VERSION, SUPPORTED_LLVM_VERSIONS } from '../toolchains/llvm.js';
import { info } from '../ui/output.js';
import { addLogLevelOption, applyLogLevel, createDeps, exitWithError, type LogLevelOptions } from './shared.js';

interface InstallCommandOptions extends LogLevelOptions {
  defaultHost?: string;
  espIdfVersion?: string;
  exportFile?: string;
  extraCrates?: string;
  llvmVersion?: string;
  nightlyVersion?: string;
  profileMinimal?: boolean;
  targets?: string;
  toolchainVersion?: string;
}

export function registerInstall(program: Command): void {
  const cmd = program
    .command('install')
    .description('Install the Rust toolchains for Espressif chips')
    .option('-d, --default-host <triple>', 'Target triple of the host')
    .option(
      '-e, --esp-idf-version <version>',
      'ESP-IDF version to install (commit:<hash>, tag:<tag>, branch:<name>, v<major>.<minor> or <branch>); also installs ldproxy',
    )
    .option('-f, --export-file <path>', 'Destination of the generated export file')
    .option('-c, --extra-crates <crates>', 'Comma or space separated list of extra crates to install')
    .option('-x, --llvm-version <version>', `LLVM version (${SUPPORTED_LLVM_VERSIONS.join(', ')})`)
    .option('-n, --nightly-version <version>', 'Nightly Rust toolchain version')
    .option('-m, --profile-minimal', 'Minifies the installation')
    .option('-t, --targets <targets>', 'Comma or space separated list of targets [esp32,esp32s2,esp32s3,esp32c2,esp32c3,all]')
    .option('-v, --toolchain-version <version>', 'Xtensa Rust toolchain version');

  addLogLevelOption(cmd).action(async (opts: InstallCommandOptions) => {
    try {
      applyLogLevel(opts);
      const deps = createDeps();
      settings.init(deps.layout.settingsPath);
      await notifyUpdate();

      info('Installing the Rust environment for Espressif chips');
      await install(
        {
          targets: opts.targets ?? settings.get('targets') ?? 'all',
          hostTriple: opts.defaultHost,
          espIdfVersion: opts.espIdfVersion,
          exportFile: opts.exportFile ?? settings.get('export_file'),
          extraCrates: opts.extraCrates,
          llvmVersion: opts.llvmVersion ?? settings.get('llvm_version') ?? DEFAULT_LLVM_VERSION,
          nightlyVersion: opts.nightlyVersion ?? settings.get('nightly_version') ?? 'nightly',
          minimal: opts.profileMinimal === true,
          toolchainVersion: opts.toolchainVersion,
        },
        deps,
      );
    } catch (err) {
      exitWithError(err);
    }
  });
}

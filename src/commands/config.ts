import { Argument, type Command } from 'commander';
import { SETTING_KEYS, type SettingKey } from '../config/schema.js';
import * as settings from '../config/settings.js';
import { InvalidOptionError } from '../core/errors.js';
import { resolveLayout } from '../core/paths.js';
import { parseTargets } from '../core/targets.js';
import { SUPPORTED_LLVM_VERSIONS } from '../toolchains/llvm.js';
import { ok } from '../ui/output.js';
import { exitWithError } from './shared.js';

/** Rejects values install would refuse anyway. */
export function validateSetting(key: SettingKey, value: string): void {
  if (key === 'targets') {
    parseTargets(value);
  } else if (key === 'llvm_version' && !SUPPORTED_LLVM_VERSIONS.includes(value)) {
    throw new InvalidOptionError(
      `LLVM version '${value}' is not supported, expected one of: ${SUPPORTED_LLVM_VERSIONS.join(', ')}`,
    );
  }
}

function keyArgument(): Argument {
  return new Argument('<key>', 'Setting name').choices(SETTING_KEYS);
}

export function registerConfig(program: Command): void {
  const cmd = program
    .command('config')
    .description('Manage the defaults install falls back to');

  cmd
    .command('set')
    .description('Set a default')
    .addArgument(keyArgument())
    .argument('<value>', 'Setting value')
    .action((key: SettingKey, value: string) => {
      try {
        validateSetting(key, value);
        settings.init(resolveLayout().settingsPath);
        settings.set(key, value);
        ok(`Set ${key} = ${value}`);
      } catch (err) {
        exitWithError(err);
      }
    });

  cmd
    .command('get')
    .description('Print a default')
    .addArgument(keyArgument())
    .action((key: SettingKey) => {
      settings.init(resolveLayout().settingsPath);
      const value = settings.get(key);
      if (value) {
        console.log(value);
      }
    });

  cmd
    .command('list')
    .description('Print every default that is set')
    .action(() => {
      settings.init(resolveLayout().settingsPath);
      for (const [key, value] of Object.entries(settings.all())) {
        console.log(`${key}: ${value}`);
      }
    });
}

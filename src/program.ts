import { Command } from 'commander';
import { APP_NAME, DESCRIPTION } from './config/branding.js';
import {
  registerCompletions,
  registerConfig,
  registerInstall,
  registerStatus,
  registerUninstall,
  registerUpdate,
  registerVersion,
} from './commands/index.js';

export function buildProgram(): Command {
  const program = new Command()
    .name(APP_NAME)
    .description(DESCRIPTION)
    .enablePositionalOptions()
    .showHelpAfterError(true);

  registerInstall(program);
  registerUpdate(program);
  registerUninstall(program);
  registerStatus(program);
  registerConfig(program);
  registerCompletions(program);
  registerVersion(program);

  return program;
}

import { Option, type Command } from 'commander';
import { ForgeError } from '../core/errors.js';
import type { OrchestratorDeps } from '../core/orchestrator.js';
import { resolveLayout } from '../core/paths.js';
import { FileStateStore } from '../core/state.js';
import { getLatestToolchainVersion } from '../core/versions.js';
import { createNodeToolbox } from '../toolchains/toolbox.js';
import { debug, fail, LOG_LEVELS, parseLogLevel, setLogLevel } from '../ui/output.js';
import { withSpinner } from '../ui/spinner.js';

export interface LogLevelOptions {
  logLevel?: string;
}

export function addLogLevelOption(cmd: Command): Command {
  return cmd.addOption(
    new Option('-l, --log-level <level>', 'Verbosity level of the logs').choices(LOG_LEVELS).default('info'),
  );
}

export function applyLogLevel({ logLevel }: LogLevelOptions): void {
  const level = parseLogLevel(logLevel ?? 'info');
  if (level) setLogLevel(level);
}

export function createDeps(env: NodeJS.ProcessEnv = process.env): OrchestratorDeps {
  const layout = resolveLayout(env);
  return {
    toolbox: createNodeToolbox(),
    layout,
    store: new FileStateStore(layout.statePath),
    latestVersion: () =>
      withSpinner('Fetching latest Xtensa Rust version', () =>
        getLatestToolchainVersion({ token: env.GITHUB_TOKEN }),
      ),
  };
}

/** Prints the failure and exits non-zero. */
export function exitWithError(err: unknown): never {
  if (err instanceof ForgeError) debug(`error code: ${err.code} (${err.kind})`);
  fail(err instanceof Error ? err.message : String(err));
  process.exit(1);
}

import { parseCrates } from '../toolchains/crates.js';
import { clearDistFolder, type ToolchainContext } from '../toolchains/helpers.js';
import { describeComponent, installComponent } from '../toolchains/index.js';
import { createXtensaRust, installXtensaRust, uninstallXtensaRust } from '../toolchains/xtensa-rust.js';
import type { PersistedState, PersistedStateData } from '../types/state.js';
import type { Toolbox } from '../types/toolchain.js';
import { debug, info, ok } from '../ui/output.js';
import { ComponentInstallError, RustupDetectionError, WrongWindowsArgumentsError } from './errors.js';
import { executePlan } from './executor.js';
import { resolveExportFile, writeExportFile } from './export-file.js';
import { getHostTriple, isWindowsHost } from './host-triple.js';
import type { Layout } from './paths.js';
import { buildInstallPlan, resolveToolchainVersion, type InstallPlan } from './plan.js';
import { clearField, type StateStorage } from './state.js';
import { runTeardown } from './teardown.js';
import { formatTargets, parseTargets, sortTargets, type Target } from './targets.js';
import { parseToolchainVersion } from './versions.js';

export interface OrchestratorDeps {
  toolbox: Toolbox;
  layout: Layout;
  store: StateStorage;
  /** Resolves the newest published Xtensa Rust version. */
  latestVersion: () => Promise<string>;
  cwd?: string;
  home?: string;
}

export interface InstallOptions {
  /** Comma or space separated chip names, or `all`. */
  targets: string;
  hostTriple?: string;
  espIdfVersion?: string;
  exportFile?: string;
  extraCrates?: string;
  llvmVersion: string;
  nightlyVersion: string;
  minimal: boolean;
  toolchainVersion?: string;
}

export interface InstallResult {
  state: PersistedState;
  exports: string[];
  plan: InstallPlan;
}

export interface UpdateOptions {
  hostTriple?: string;
  toolchainVersion?: string;
}

// ESP-IDF's Windows installer only supports the full chip set.
const WINDOWS_ESP_IDF_TARGETS: readonly Target[] = ['esp32', 'esp32s2', 'esp32s3', 'esp32c3'];

function ctxOf(deps: OrchestratorDeps): ToolchainContext {
  return { toolbox: deps.toolbox, layout: deps.layout };
}

/**
 * Fails when rustup is missing and installs the nightly toolchain the
 * RISC-V targets are added to when it is not there yet.
 */
export async function ensureRustInstallation(nightlyVersion: string, toolbox: Toolbox): Promise<void> {
  try {
    await toolbox.run('rustc', ['--version']);
  } catch (err) {
    throw new RustupDetectionError(err instanceof Error ? err.message : String(err), { cause: err });
  }

  const toolchains = await toolbox.run('rustup', ['toolchain', 'list']);
  const installed = toolchains.split(/\r?\n/).some((line) => line.trim().startsWith(nightlyVersion));
  if (!installed) {
    info(`Installing '${nightlyVersion}' Rust toolchain`);
    await toolbox.run('rustup', ['toolchain', 'install', nightlyVersion, '--profile', 'minimal']);
  }
}

/**
 * Installs everything the requested targets need and records it. The state
 * file is written once, after every component succeeded; a failed run
 * records nothing.
 */
export async function install(opts: InstallOptions, deps: OrchestratorDeps): Promise<InstallResult> {
  const targets = parseTargets(opts.targets);
  const hostTriple = getHostTriple(opts.hostTriple);
  const windows = isWindowsHost(hostTriple);
  const requestedCrates = parseCrates(opts.extraCrates ?? '');

  if (windows && opts.espIdfVersion && !WINDOWS_ESP_IDF_TARGETS.every((t) => targets.has(t))) {
    throw new WrongWindowsArgumentsError();
  }

  const exportFile = resolveExportFile(opts.exportFile, { cwd: deps.cwd, home: deps.home, windows });
  const toolchainVersion = await resolveToolchainVersion(targets, opts.toolchainVersion, deps.latestVersion);

  const plan = buildInstallPlan({
    targets,
    hostTriple,
    layout: deps.layout,
    toolchainVersion,
    llvmVersion: opts.llvmVersion,
    minimal: opts.minimal,
    nightlyVersion: opts.nightlyVersion,
    espIdfVersion: opts.espIdfVersion,
    extraCrates: requestedCrates,
  });

  debug(`Host triple: ${hostTriple}`);
  debug(`Targets: ${formatTargets(sortTargets(targets))}`);
  debug(`Export file: ${exportFile}`);
  debug(`Plan: ${plan.components.map(describeComponent).join(', ')}`);

  await ensureRustInstallation(opts.nightlyVersion, deps.toolbox);

  const ctx = ctxOf(deps);
  const exports = await executePlan(plan.components, (component) => installComponent(component, ctx));

  if (opts.minimal) {
    await clearDistFolder(ctx);
  }

  writeExportFile(exportFile, exports, windows);

  const state: PersistedStateData = {
    hostTriple,
    targets: sortTargets(targets),
    llvmPath: plan.llvm.path,
    nightlyVersion: opts.nightlyVersion,
    exportFile,
  };
  if (plan.xtensaRust) {
    state.xtensaRust = { version: plan.xtensaRust.version, path: plan.xtensaRust.path };
  }
  if (opts.espIdfVersion) {
    state.espIdfVersion = opts.espIdfVersion;
  }
  if (plan.extraCrates.size > 0) {
    state.extraCrates = [...plan.extraCrates].sort();
  }

  info('Saving installation state');
  deps.store.save(state);
  ok('Installation successfully completed!');
  return { state, exports, plan };
}

/**
 * Removes everything the state file records. Fails without touching the
 * filesystem when nothing is recorded.
 */
export async function uninstall(deps: OrchestratorDeps): Promise<PersistedState> {
  const state = deps.store.load();
  debug(`Recorded state: ${JSON.stringify(state)}`);

  const remaining = await runTeardown(state, deps.store, ctxOf(deps));
  ok('Uninstallation successfully completed!');
  return remaining;
}

/** Replaces the recorded Xtensa Rust toolchain with another version. */
export async function update(opts: UpdateOptions, deps: OrchestratorDeps): Promise<PersistedState> {
  const hostTriple = getHostTriple(opts.hostTriple);
  const state = deps.store.load();
  const version = opts.toolchainVersion
    ? parseToolchainVersion(opts.toolchainVersion)
    : await deps.latestVersion();

  const current = state.xtensaRust;
  if (!current) {
    info('No Xtensa Rust toolchain is installed, nothing to update');
    return state;
  }
  if (current.version === version) {
    ok(`Toolchain '${version}' is already up to date`);
    return state;
  }

  const ctx = ctxOf(deps);
  await uninstallXtensaRust(current.path, ctx);
  const cleared = clearField(state, 'xtensaRust');
  deps.store.save(cleared);

  const next = createXtensaRust(version, hostTriple, deps.layout);
  try {
    await installXtensaRust(next, ctx);
  } catch (err) {
    throw new ComponentInstallError(describeComponent(next), err);
  }

  const updated: PersistedState = { ...cleared, xtensaRust: { version: next.version, path: next.path } };
  deps.store.save(updated);
  ok('Update successfully completed!');
  return updated;
}

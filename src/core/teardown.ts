import { gccFlavorFor } from '../toolchains/gcc.js';
import { clearDistFolder, removeFileOrFail, type ToolchainContext } from '../toolchains/helpers.js';
import { uninstallComponent } from '../toolchains/index.js';
import type { PersistedState } from '../types/state.js';
import { debug } from '../ui/output.js';
import { clearField, type StateStorage } from './state.js';
import {
  isRiscv,
  needsRiscvTargetSupport,
  needsSharedRiscvGcc,
  xtensaGccTargets,
  type Target,
} from './targets.js';

export interface TeardownStep {
  label: string;
  /** Physically removes the artifact; a no-op when it is already gone. */
  reverse(ctx: ToolchainContext): Promise<void>;
  /** Derives the snapshot that no longer names the artifact. */
  apply(state: PersistedState): PersistedState;
}

function withoutTargets(state: PersistedState, drop: (t: Target) => boolean): PersistedState {
  return { ...state, targets: state.targets.filter((t) => !drop(t)) };
}

function withoutCrate(state: PersistedState, name: string): PersistedState {
  const remaining = (state.extraCrates ?? []).filter((c) => c !== name);
  return remaining.length > 0 ? { ...state, extraCrates: remaining } : clearField(state, 'extraCrates');
}

/**
 * Orders the removal of everything `state` records: Xtensa Rust, LLVM,
 * RISC-V targets, then ESP-IDF or the GCC toolchains, the extra crates and
 * finally the export file. Absent fields contribute no steps, which is how
 * an interrupted uninstall resumes.
 */
export function planTeardown(state: PersistedState): TeardownStep[] {
  const steps: TeardownStep[] = [];

  const { xtensaRust } = state;
  if (xtensaRust) {
    steps.push({
      label: `Xtensa Rust ${xtensaRust.version}`,
      reverse: (ctx) => uninstallComponent({ kind: 'xtensa-rust', path: xtensaRust.path }, ctx),
      apply: (s) => clearField(s, 'xtensaRust'),
    });
  }

  const { llvmPath } = state;
  if (llvmPath) {
    steps.push({
      label: 'LLVM',
      reverse: (ctx) => uninstallComponent({ kind: 'llvm', path: llvmPath }, ctx),
      apply: (s) => clearField(s, 'llvmPath'),
    });
  }

  // nightlyVersion records the toolchain the RISC-V targets were added to.
  const { nightlyVersion } = state;
  if (nightlyVersion) {
    const targets = new Set(state.targets);
    steps.push({
      label: `RISC-V targets (${nightlyVersion})`,
      reverse: async (ctx) => {
        if (needsRiscvTargetSupport(targets)) {
          await uninstallComponent({ kind: 'riscv-target', nightlyVersion }, ctx);
        }
      },
      apply: (s) => clearField(s, 'nightlyVersion'),
    });
  }

  const { espIdfVersion } = state;
  if (espIdfVersion) {
    steps.push({
      label: `ESP-IDF ${espIdfVersion}`,
      reverse: (ctx) => uninstallComponent({ kind: 'esp-idf', version: espIdfVersion }, ctx),
      apply: (s) => clearField(s, 'espIdfVersion'),
    });
  } else {
    const targets = new Set(state.targets);
    // One RISC-V GCC serves the C-series cores and the S-series ULP coprocessors.
    if (needsSharedRiscvGcc(targets)) {
      steps.push({
        label: 'GCC riscv32-esp-elf',
        reverse: (ctx) => uninstallComponent({ kind: 'gcc', flavor: 'riscv32' }, ctx),
        apply: (s) => withoutTargets(s, isRiscv),
      });
    }
    for (const target of xtensaGccTargets(targets)) {
      steps.push({
        label: `GCC for ${target}`,
        reverse: (ctx) => uninstallComponent({ kind: 'gcc', flavor: gccFlavorFor(target) }, ctx),
        apply: (s) => withoutTargets(s, (t) => t === target),
      });
    }
  }

  for (const name of state.extraCrates ?? []) {
    steps.push({
      label: `crate ${name}`,
      reverse: (ctx) => uninstallComponent({ kind: 'crate', name }, ctx),
      apply: (s) => withoutCrate(s, name),
    });
  }

  const { exportFile } = state;
  if (exportFile) {
    steps.push({
      label: 'export file',
      reverse: ({ toolbox }) => removeFileOrFail(toolbox, exportFile),
      apply: (s) => clearField(s, 'exportFile'),
    });
  }

  return steps;
}

/**
 * Runs every step in order. Each artifact is removed first and the state is
 * persisted right after, so a crash between steps leaves a record naming
 * only what is still present. The record itself is deleted last.
 */
export async function runTeardown(
  state: PersistedState,
  storage: StateStorage,
  ctx: ToolchainContext,
): Promise<PersistedState> {
  let current = state;
  for (const step of planTeardown(state)) {
    debug(`Reversing ${step.label}`);
    await step.reverse(ctx);
    current = step.apply(current);
    storage.save(current);
  }

  await clearDistFolder(ctx);
  storage.delete();
  return current;
}

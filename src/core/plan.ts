import type { Component, LlvmComponent, XtensaRustComponent } from '../types/toolchain.js';
import { createCrate, LDPROXY } from '../toolchains/crates.js';
import { createEspIdf } from '../toolchains/esp-idf.js';
import { createGcc, gccFlavorFor } from '../toolchains/gcc.js';
import { createLlvm } from '../toolchains/llvm.js';
import { createRiscvTarget } from '../toolchains/riscv-target.js';
import { createXtensaRust } from '../toolchains/xtensa-rust.js';
import { InvalidOptionError } from './errors.js';
import type { HostTriple } from './host-triple.js';
import type { Layout } from './paths.js';
import {
  needsRiscvTargetSupport,
  needsSharedRiscvGcc,
  needsXtensaRustToolchain,
  sortTargets,
  xtensaGccTargets,
  type Target,
} from './targets.js';
import { parseToolchainVersion } from './versions.js';

export interface PlanOptions {
  targets: ReadonlySet<Target>;
  hostTriple: HostTriple;
  layout: Layout;
  /** Concrete Xtensa Rust version; required when an Xtensa target is requested. */
  toolchainVersion?: string;
  llvmVersion: string;
  minimal: boolean;
  nightlyVersion: string;
  espIdfVersion?: string;
  extraCrates: ReadonlySet<string>;
}

export interface InstallPlan {
  components: Component[];
  xtensaRust?: XtensaRustComponent;
  llvm: LlvmComponent;
  /** Requested crates plus any forced by the plan. */
  extraCrates: Set<string>;
}

/**
 * Resolves the Xtensa Rust version the plan needs: none when no Xtensa
 * target was requested, the explicit one when given, the latest otherwise.
 */
export async function resolveToolchainVersion(
  targets: ReadonlySet<Target>,
  explicit: string | undefined,
  latest: () => Promise<string>,
): Promise<string | undefined> {
  if (!needsXtensaRustToolchain(targets)) return undefined;
  if (explicit) return parseToolchainVersion(explicit);
  return latest();
}

/**
 * Maps the requested targets and options onto the components to install.
 * The components are independent of each other and may be installed in any
 * order, including concurrently.
 */
export function buildInstallPlan(opts: PlanOptions): InstallPlan {
  const { targets, hostTriple, layout } = opts;
  const components: Component[] = [];

  let xtensaRust: XtensaRustComponent | undefined;
  if (needsXtensaRustToolchain(targets)) {
    if (!opts.toolchainVersion) {
      throw new InvalidOptionError('An Xtensa Rust toolchain version is required for Xtensa targets');
    }
    xtensaRust = createXtensaRust(opts.toolchainVersion, hostTriple, layout);
    components.push(xtensaRust);
  }

  const llvm = createLlvm(opts.llvmVersion, opts.minimal, hostTriple, layout);
  components.push(llvm);

  if (needsRiscvTargetSupport(targets)) {
    components.push(createRiscvTarget(opts.nightlyVersion));
  }

  const extraCrates = new Set(opts.extraCrates);
  if (opts.espIdfVersion) {
    components.push(createEspIdf(opts.espIdfVersion, sortTargets(targets), hostTriple, layout));
    extraCrates.add(LDPROXY);
  } else {
    for (const target of xtensaGccTargets(targets)) {
      components.push(createGcc(gccFlavorFor(target), hostTriple, layout));
    }
    if (needsSharedRiscvGcc(targets)) {
      components.push(createGcc('riscv32', hostTriple, layout));
    }
  }

  for (const name of extraCrates) {
    components.push(createCrate(name));
  }

  return { components, xtensaRust, llvm, extraCrates };
}

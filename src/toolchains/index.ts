import type { Component, InstalledComponent } from '../types/toolchain.js';
import { installCrate, uninstallCrate } from './crates.js';
import { installEspIdf, uninstallEspIdf } from './esp-idf.js';
import { installGcc, uninstallGcc } from './gcc.js';
import type { ToolchainContext } from './helpers.js';
import { installLlvm, uninstallLlvm } from './llvm.js';
import { installRiscvTarget, uninstallRiscvTarget } from './riscv-target.js';
import { installXtensaRust, uninstallXtensaRust } from './xtensa-rust.js';

export type { ToolchainContext } from './helpers.js';

/**
 * Installs one component and resolves with the environment export lines it
 * needs in the shell.
 */
export async function installComponent(component: Component, ctx: ToolchainContext): Promise<string[]> {
  switch (component.kind) {
    case 'xtensa-rust':
      return installXtensaRust(component, ctx);
    case 'llvm':
      return installLlvm(component, ctx);
    case 'riscv-target':
      return installRiscvTarget(component, ctx);
    case 'gcc':
      return installGcc(component, ctx);
    case 'esp-idf':
      return installEspIdf(component, ctx);
    case 'crate':
      return installCrate(component, ctx);
  }
}

/** Reverses {@link installComponent}; reversing an absent component is a no-op. */
export async function uninstallComponent(component: InstalledComponent, ctx: ToolchainContext): Promise<void> {
  switch (component.kind) {
    case 'xtensa-rust':
      return uninstallXtensaRust(component.path, ctx);
    case 'llvm':
      return uninstallLlvm(component.path, ctx);
    case 'riscv-target':
      return uninstallRiscvTarget(component.nightlyVersion, ctx);
    case 'gcc':
      return uninstallGcc(component.flavor, ctx);
    case 'esp-idf':
      return uninstallEspIdf(component.version, ctx);
    case 'crate':
      return uninstallCrate(component.name, ctx);
  }
}

export function describeComponent(component: Component): string {
  switch (component.kind) {
    case 'xtensa-rust':
      return `Xtensa Rust ${component.version}`;
    case 'llvm':
      return `LLVM ${component.version}${component.minimal ? ' (minimal)' : ''}`;
    case 'riscv-target':
      return `RISC-V targets (${component.nightlyVersion})`;
    case 'gcc':
      return `GCC ${component.toolchainName}`;
    case 'esp-idf':
      return `ESP-IDF ${component.version}`;
    case 'crate':
      return `crate ${component.name}`;
  }
}

/** Stable identity used to compare plans as sets. */
export function componentKey(component: Component): string {
  switch (component.kind) {
    case 'xtensa-rust':
      return `xtensa-rust@${component.version}`;
    case 'llvm':
      return `llvm@${component.version}${component.minimal ? ':minimal' : ''}`;
    case 'riscv-target':
      return `riscv-target@${component.nightlyVersion}`;
    case 'gcc':
      return `gcc:${component.toolchainName}`;
    case 'esp-idf':
      return `esp-idf@${component.version}`;
    case 'crate':
      return `crate:${component.name}`;
  }
}

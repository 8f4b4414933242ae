import type { HostTriple } from '../core/host-triple.js';
import type { Target } from '../core/targets.js';
import type { GitRef } from '../core/versions.js';

export type GccFlavor = 'xtensa-esp32' | 'xtensa-esp32s2' | 'xtensa-esp32s3' | 'riscv32';

export interface XtensaRustComponent {
  kind: 'xtensa-rust';
  version: string;
  hostTriple: HostTriple;
  /** `<rustup home>/toolchains/esp` */
  path: string;
  distUrl: string;
  srcDistUrl: string;
}

export interface LlvmComponent {
  kind: 'llvm';
  version: string;
  minimal: boolean;
  hostTriple: HostTriple;
  path: string;
  url: string;
}

export interface RiscvTargetComponent {
  kind: 'riscv-target';
  nightlyVersion: string;
}

export interface GccComponent {
  kind: 'gcc';
  flavor: GccFlavor;
  toolchainName: string;
  hostTriple: HostTriple;
  path: string;
  url: string;
}

export interface EspIdfComponent {
  kind: 'esp-idf';
  version: string;
  gitRef: GitRef;
  targets: Target[];
  hostTriple: HostTriple;
  path: string;
}

export interface CrateComponent {
  kind: 'crate';
  name: string;
}

/** Closed set of installable components. */
export type Component =
  | XtensaRustComponent
  | LlvmComponent
  | RiscvTargetComponent
  | GccComponent
  | EspIdfComponent
  | CrateComponent;

/**
 * What a component must still know to reverse itself once installed. Every
 * {@link Component} is one; teardown rebuilds them from the persisted state.
 */
export type InstalledComponent =
  | Pick<XtensaRustComponent, 'kind' | 'path'>
  | Pick<LlvmComponent, 'kind' | 'path'>
  | Pick<RiscvTargetComponent, 'kind' | 'nightlyVersion'>
  | Pick<GccComponent, 'kind' | 'flavor'>
  | Pick<EspIdfComponent, 'kind' | 'version'>
  | CrateComponent;

export interface DownloadOptions {
  /** File name to store the artifact under before extraction. */
  fileName: string;
  /** Extract the archive into the destination and remove it afterwards. */
  extract: boolean;
}

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string | undefined>;
}

/**
 * The I/O collaborators components are built on. The Node implementation
 * performs real downloads and subprocesses; tests substitute a recorder.
 */
export interface Toolbox {
  download(url: string, destDir: string, opts: DownloadOptions): Promise<string>;
  run(command: string, args: string[], opts?: RunOptions): Promise<string>;
  clone(url: string, destDir: string, ref: GitRef): Promise<void>;
  pathExists(path: string): Promise<boolean>;
  /** Recursive removal; an absent path is not an error. */
  removeDir(path: string): Promise<void>;
  removeFile(path: string): Promise<void>;
}

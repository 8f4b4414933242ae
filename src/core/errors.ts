/**
 * Error taxonomy. Every failure the CLI reports is a {@link ForgeError} with a
 * stable `code` and one of four kinds; the kind decides whether the operator
 * can simply re-run the command or has to intervene by hand.
 */

export type ErrorKind =
  | 'input-validation'
  | 'network-io'
  | 'state-consistency'
  | 'environmental-precondition';

export class ForgeError extends Error {
  readonly code: string;
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.code = code;
  }
}

// ── Input validation ────────────────────────────────────────────────

export class UnsupportedTargetError extends ForgeError {
  constructor(readonly token: string) {
    super('input-validation', 'targets.unsupported_target', `Target '${token}' is not supported`);
  }
}

export class InvalidToolchainVersionError extends ForgeError {
  constructor(readonly version: string) {
    super(
      'input-validation',
      'toolchain.rust.invalid_version',
      `Invalid toolchain version '${version}', must be in the form of '<major>.<minor>.<patch>.<subpatch>'`,
    );
  }
}

export class InvalidOptionError extends ForgeError {
  constructor(message: string) {
    super('input-validation', 'cli.invalid_option', message);
  }
}

// ── Environmental preconditions ─────────────────────────────────────

export class UnsupportedHostTripleError extends ForgeError {
  constructor(readonly triple: string) {
    super('environmental-precondition', 'host_triple.unsupported_host_triple', `Host triple '${triple}' is not supported`);
  }
}

export class WrongWindowsArgumentsError extends ForgeError {
  constructor() {
    super(
      'environmental-precondition',
      'wrong_windows_arguments',
      'When installing ESP-IDF on Windows, only --targets "all" is supported.',
    );
  }
}

export class RustupDetectionError extends ForgeError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super('environmental-precondition', 'toolchain.rust.detection_error', `Error detecting rustup: ${detail}`, options);
  }
}

export class ToolchainAlreadyInstalledError extends ForgeError {
  constructor(readonly path: string) {
    super(
      'environmental-precondition',
      'toolchain.rust.already_installed',
      `Previous installation of Rust Toolchain exists in: '${path}'. Please, remove the directory before new installation.`,
    );
  }
}

// ── Network and IO ──────────────────────────────────────────────────

export class DownloadError extends ForgeError {
  constructor(readonly url: string, detail: string, options?: { cause?: unknown }) {
    super('network-io', 'toolchain.download_failed', `Failed to download '${url}': ${detail}`, options);
  }
}

export class UnsupportedArchiveError extends ForgeError {
  constructor(readonly file: string) {
    super('network-io', 'toolchain.unsupported_file_extension', `Unsupported file extension: '${file}'`);
  }
}

export class CommandError extends ForgeError {
  constructor(readonly command: string, detail: string, options?: { cause?: unknown }) {
    super('network-io', 'cmd.failed', `Command '${command}' failed: ${detail}`, options);
  }
}

export class LatestVersionError extends ForgeError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super('network-io', 'toolchain.rust.failed_to_get_latest_version', `Failed to get the latest toolchain version: ${detail}`, options);
  }
}

export class ComponentInstallError extends ForgeError {
  constructor(readonly component: string, cause: unknown) {
    super(
      cause instanceof ForgeError ? cause.kind : 'network-io',
      cause instanceof ForgeError ? cause.code : 'toolchain.install_failed',
      `Failed to install ${component}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

// ── State consistency ───────────────────────────────────────────────

export class NoInstallationFoundError extends ForgeError {
  constructor(readonly statePath: string) {
    super('state-consistency', 'config.file_not_found', `No installation found: no state file in '${statePath}'`);
  }
}

export class CorruptStateError extends ForgeError {
  constructor(readonly statePath: string, detail: string, options?: { cause?: unknown }) {
    super(
      'state-consistency',
      'config.failed_to_deserialize',
      `State file '${statePath}' is unreadable (${detail}). Please, fix or remove it manually.`,
      options,
    );
  }
}

export class StateWriteError extends ForgeError {
  constructor(readonly statePath: string, options?: { cause?: unknown }) {
    super('state-consistency', 'config.failed_to_write', `Failed to write state to '${statePath}'`, options);
  }
}

export class FailedToRemoveError extends ForgeError {
  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(
      'state-consistency',
      'failed_to_remove',
      `Failed to remove '${path}'. Please, manually verify that it is properly removed and run 'espforge uninstall' again.`,
      options,
    );
  }
}

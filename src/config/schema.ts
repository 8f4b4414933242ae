import { z } from 'zod';
import { HOST_TRIPLES } from '../core/host-triple.js';
import { ALL_TARGETS } from '../core/targets.js';

// ── Shared sub-schemas ──────────────────────────────────────────────

const toolchainVersionPattern = /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)$/;

export const TargetSchema = z.enum(ALL_TARGETS);

export const HostTripleSchema = z.enum(HOST_TRIPLES);

export const XtensaRustRecordSchema = z.object({
  version: z.string().regex(toolchainVersionPattern, '<major>.<minor>.<patch>.<subpatch>'),
  path: z.string().min(1),
});

// ── Persisted installation state ────────────────────────────────────

/**
 * A field is present exactly while the artifact it names is on disk or
 * registered with the toolchain manager.
 */
export const PersistedStateSchema = z.object({
  hostTriple: HostTripleSchema,
  targets: z.array(TargetSchema),
  espIdfVersion: z.string().min(1).optional(),
  xtensaRust: XtensaRustRecordSchema.optional(),
  llvmPath: z.string().min(1).optional(),
  extraCrates: z.array(z.string().min(1)).optional(),
  exportFile: z.string().min(1).optional(),
  nightlyVersion: z.string().min(1).optional(),
});

// ── User settings ───────────────────────────────────────────────────

export const SETTING_KEYS = ['nightly_version', 'llvm_version', 'targets', 'export_file'] as const;

export type SettingKey = (typeof SETTING_KEYS)[number];

export const SettingsSchema = z.object({
  nightly_version: z.string().min(1).optional(),
  llvm_version: z.coerce.string().optional(),
  targets: z.string().min(1).optional(),
  export_file: z.string().min(1).optional(),
});

import { UnsupportedTargetError } from './errors.js';

export const ALL_TARGETS = ['esp32', 'esp32s2', 'esp32s3', 'esp32c2', 'esp32c3'] as const;

export type Target = (typeof ALL_TARGETS)[number];

const XTENSA_TARGETS: ReadonlySet<Target> = new Set(['esp32', 'esp32s2', 'esp32s3']);
const RISCV_TARGETS: ReadonlySet<Target> = new Set(['esp32c2', 'esp32c3']);
// S2 and S3 carry a RISC-V ULP coprocessor next to their Xtensa core.
const RISCV_COPROCESSOR_TARGETS: ReadonlySet<Target> = new Set(['esp32s2', 'esp32s3']);

export function parseTarget(s: string): Target | null {
  const lower = s.toLowerCase();
  return ALL_TARGETS.find((t) => t === lower) ?? null;
}

/**
 * Parses a comma or space separated list of chip names, or `all`.
 */
export function parseTargets(input: string): Set<Target> {
  const tokens = input.split(/[\s,]+/).filter((t) => t.length > 0);
  if (tokens.length === 0) {
    throw new UnsupportedTargetError(input.trim());
  }

  const targets = new Set<Target>();
  let all = false;
  for (const token of tokens) {
    if (token.toLowerCase() === 'all') {
      all = true;
      continue;
    }
    const target = parseTarget(token);
    if (!target) throw new UnsupportedTargetError(token);
    targets.add(target);
  }
  return all ? new Set(ALL_TARGETS) : targets;
}

export function isXtensa(target: Target): boolean {
  return XTENSA_TARGETS.has(target);
}

export function isRiscv(target: Target): boolean {
  return RISCV_TARGETS.has(target);
}

export function needsRiscvCoprocessor(target: Target): boolean {
  return RISCV_COPROCESSOR_TARGETS.has(target);
}

export function needsXtensaRustToolchain(targets: ReadonlySet<Target>): boolean {
  return [...targets].some(isXtensa);
}

export function needsRiscvTargetSupport(targets: ReadonlySet<Target>): boolean {
  return [...targets].some((t) => isRiscv(t) || needsRiscvCoprocessor(t));
}

export function xtensaGccTargets(targets: ReadonlySet<Target>): Target[] {
  return sortTargets(targets).filter(isXtensa);
}

/** Every target except plain ESP32 needs the single RISC-V GCC. */
export function needsSharedRiscvGcc(targets: ReadonlySet<Target>): boolean {
  return [...targets].some((t) => t !== 'esp32');
}

export function sortTargets(targets: Iterable<Target>): Target[] {
  const present = new Set(targets);
  return ALL_TARGETS.filter((t) => present.has(t));
}

export function formatTargets(targets: Iterable<Target>): string {
  return sortTargets(targets).join(',');
}

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { PersistedStateSchema } from '../config/schema.js';
import type { OptionalStateField, PersistedState, PersistedStateData } from '../types/state.js';
import { CorruptStateError, NoInstallationFoundError, StateWriteError } from './errors.js';
import { sortTargets } from './targets.js';

/** Durable record of what is currently installed. */
export interface StateStorage {
  readonly path: string;
  exists(): boolean;
  /** Throws {@link NoInstallationFoundError} when nothing is recorded. */
  load(): PersistedState;
  save(state: PersistedState): void;
  delete(): void;
}

export class FileStateStore implements StateStorage {
  constructor(readonly path: string) {}

  exists(): boolean {
    return existsSync(this.path);
  }

  load(): PersistedState {
    let raw: string;
    try {
      raw = readFileSync(this.path, 'utf-8');
    } catch (err) {
      if (!this.exists()) throw new NoInstallationFoundError(this.path);
      throw new CorruptStateError(this.path, String(err), { cause: err });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new CorruptStateError(this.path, 'not valid JSON', { cause: err });
    }

    const parsed = PersistedStateSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new CorruptStateError(this.path, issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid');
    }
    return parsed.data;
  }

  tryLoad(): PersistedState | null {
    return this.exists() ? this.load() : null;
  }

  /** Writes a temp file next to the state file and renames it into place. */
  save(state: PersistedState): void {
    const tmp = `${this.path}.tmp`;
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(tmp, serializeState(state), 'utf-8');
      renameSync(tmp, this.path);
    } catch (err) {
      throw new StateWriteError(this.path, { cause: err });
    }
  }

  delete(): void {
    rmSync(this.path, { force: true });
  }
}

export function serializeState(state: PersistedState): string {
  const ordered: PersistedStateData = {
    ...state,
    targets: sortTargets(state.targets),
    ...(state.extraCrates ? { extraCrates: [...state.extraCrates].sort() } : {}),
  };
  return `${JSON.stringify(ordered, null, 2)}\n`;
}

/** Returns a copy of `state` without `field`. */
export function clearField(state: PersistedState, field: OptionalStateField): PersistedState {
  const next: PersistedStateData = { ...state };
  delete next[field];
  return next;
}

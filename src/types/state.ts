import type { z } from 'zod';
import type {
  PersistedStateSchema,
  SettingsSchema,
} from '../config/schema.js';

export type PersistedStateData = z.infer<typeof PersistedStateSchema>;
/** Snapshots are never mutated; each teardown step derives a new one. */
export type PersistedState = Readonly<PersistedStateData>;
export type Settings = z.infer<typeof SettingsSchema>;

export type OptionalStateField = {
  [K in keyof PersistedStateData]-?: undefined extends PersistedStateData[K] ? K : never;
}[keyof PersistedStateData];

/**
 * Key-value config storage operations.
 */

import { eq } from 'drizzle-orm';
import type { TasklineDb } from '../db.js';
import type { DataResult } from '../types/results.js';
import { invalidArgument } from '../types/results.js';
import { resolveTimezone } from '../temporal/day-window.js';
import { config } from '../schema/index.js';

export const ConfigKey = {
  DefaultUser: 'default_user',
  Timezone: 'timezone',
} as const;

export type ConfigKey = (typeof ConfigKey)[keyof typeof ConfigKey];

export const CONFIG_KEYS: readonly ConfigKey[] = [ConfigKey.DefaultUser, ConfigKey.Timezone];

export function isConfigKey(key: string): key is ConfigKey {
  return key === ConfigKey.DefaultUser || key === ConfigKey.Timezone;
}

/** Get a config value by key */
export function getConfig(db: TasklineDb, key: string): string | null {
  const row = db.select({ value: config.value }).from(config).where(eq(config.key, key)).get();
  return row?.value ?? null;
}

/** Set a config value */
export function setConfig(db: TasklineDb, key: string, value: string): void {
  db.insert(config).values({ key, value }).onConflictDoUpdate({ target: config.key, set: { value } }).run();
}

/** Validate and store one of the known settings */
export function setSetting(db: TasklineDb, key: string, value: string): DataResult<string> {
  if (!isConfigKey(key)) {
    return invalidArgument(`Unknown config key "${key}". Valid keys: ${CONFIG_KEYS.join(', ')}`);
  }
  const trimmed = value.trim();
  if (!trimmed) return invalidArgument(`A value is required for ${key}`);

  if (key === ConfigKey.Timezone) {
    const tz = resolveTimezone(trimmed);
    if (tz.type !== 'success') return tz;
  }

  setConfig(db, key, trimmed);
  return { type: 'success', data: trimmed, message: `Set ${key} to ${trimmed}` };
}

/** The owner used when none is given on the command line */
export function getDefaultUser(db: TasklineDb): string | null {
  return getConfig(db, ConfigKey.DefaultUser);
}

/** The timezone used when none is given on the command line */
export function getDefaultTimezone(db: TasklineDb): string | null {
  return getConfig(db, ConfigKey.Timezone);
}

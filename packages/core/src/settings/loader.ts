/**
 * @fileoverview Settings Loader
 *
 * Loads user settings from ~/.burrow/settings.json, merges them over the
 * defaults, applies BURROW_* environment overrides and validates the result.
 * Settings are cached after the first load.
 */

import * as fs from 'node:fs';
import * as fsAsync from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { DEFAULT_SETTINGS } from './defaults.js';
import { SettingsSchema, type BurrowSettings, type UserSettings } from './types.js';
import { SettingsValidationError } from '../utils/errors.js';
import { isNotFoundError, writeJsonAtomic } from '../utils/atomic-write.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('settings');

// =============================================================================
// Constants
// =============================================================================

const SETTINGS_DIR = '.burrow';
const SETTINGS_FILE = 'settings.json';

/**
 * Environment variables and the setting each one overrides
 */
const ENV_OVERRIDES: ReadonlyArray<readonly [string, readonly string[]]> = [
  ['BURROW_DATA_DIR', ['persistence', 'dataDir']],
  ['BURROW_WORKSPACE', ['agent', 'workspace']],
  ['BURROW_MODEL', ['model', 'model']],
  ['BURROW_API_BASE', ['model', 'apiBase']],
  ['BURROW_API_KEY', ['model', 'apiKey']],
  ['BURROW_CONSOLIDATION_THRESHOLD', ['memory', 'consolidationThreshold']],
  ['BURROW_MAX_TOOL_ROUNDS', ['agent', 'maxToolRounds']],
];

// =============================================================================
// Merge Utilities
// =============================================================================

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source taking precedence.
 * Arrays are replaced entirely, not merged.
 */
export function deepMerge(target: JsonRecord, source: JsonRecord): JsonRecord {
  const result: JsonRecord = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function setPath(record: JsonRecord, keys: readonly string[], value: unknown): JsonRecord {
  const [head, ...rest] = keys;
  if (head === undefined) return record;
  if (rest.length === 0) {
    return { ...record, [head]: value };
  }
  const child = record[head];
  return { ...record, [head]: setPath(isRecord(child) ? child : {}, rest, value) };
}

// =============================================================================
// Paths
// =============================================================================

export function getSettingsDir(homeDir?: string): string {
  return path.join(homeDir ?? os.homedir(), SETTINGS_DIR);
}

export function getSettingsPath(homeDir?: string): string {
  return path.join(getSettingsDir(homeDir), SETTINGS_FILE);
}

/**
 * Expand a leading `~` and resolve to an absolute path
 */
export function resolveBurrowPath(value: string, homeDir?: string): string {
  const home = homeDir ?? os.homedir();
  if (value === '~') return home;
  if (value.startsWith('~/')) return path.join(home, value.slice(2));
  return path.resolve(value);
}

// =============================================================================
// Settings Loading
// =============================================================================

function parseUserSettings(content: string, filePath: string): JsonRecord | null {
  try {
    const parsed: unknown = JSON.parse(content);
    if (isRecord(parsed)) {
      return parsed;
    }
    logger.warn('Settings file is not a JSON object, using defaults', { filePath });
  } catch (error) {
    logger.warn('Failed to parse settings file, using defaults', {
      filePath,
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return null;
}

/**
 * Apply BURROW_* environment variables over raw settings
 */
export function applyEnvOverrides(settings: JsonRecord, env: NodeJS.ProcessEnv = process.env): JsonRecord {
  let result = settings;
  for (const [variable, keys] of ENV_OVERRIDES) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      result = setPath(result, keys, value);
    }
  }
  return result;
}

/**
 * Merge, override and validate. Throws SettingsValidationError on bad values.
 */
export function resolveSettings(
  userSettings: JsonRecord | UserSettings | null,
  source: string,
  env: NodeJS.ProcessEnv = process.env
): BurrowSettings {
  const merged = deepMerge({ ...DEFAULT_SETTINGS }, { ...userSettings });
  const parsed = SettingsSchema.safeParse(applyEnvOverrides(merged, env));
  if (!parsed.success) {
    throw new SettingsValidationError(
      source,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Load and merge settings (synchronous - prefer the async version)
 */
export function loadSettings(settingsPath?: string): BurrowSettings {
  const filePath = settingsPath ?? getSettingsPath();
  let userSettings: JsonRecord | null = null;
  try {
    userSettings = parseUserSettings(fs.readFileSync(filePath, 'utf-8'), filePath);
  } catch (error) {
    if (!isNotFoundError(error)) throw error;
  }
  return resolveSettings(userSettings, filePath);
}

/**
 * Load and merge settings (async - preferred for startup)
 */
export async function loadSettingsAsync(settingsPath?: string): Promise<BurrowSettings> {
  const filePath = settingsPath ?? getSettingsPath();
  let userSettings: JsonRecord | null = null;
  try {
    userSettings = parseUserSettings(await fsAsync.readFile(filePath, 'utf-8'), filePath);
  } catch (error) {
    if (!isNotFoundError(error)) throw error;
  }
  return resolveSettings(userSettings, filePath);
}

export async function saveSettings(settings: UserSettings, settingsPath?: string): Promise<void> {
  await writeJsonAtomic(settingsPath ?? getSettingsPath(), settings);
}

// =============================================================================
// Singleton Settings Instance
// =============================================================================

let cachedSettings: BurrowSettings | null = null;
let customSettingsPath: string | undefined;
let preloadPromise: Promise<BurrowSettings> | null = null;

/**
 * Preload settings asynchronously (call at startup). Later getSettings()
 * calls return the cached result.
 */
export async function preloadSettings(): Promise<BurrowSettings> {
  if (cachedSettings) {
    return cachedSettings;
  }
  if (!preloadPromise) {
    preloadPromise = loadSettingsAsync(customSettingsPath).then(
      (settings) => {
        cachedSettings = settings;
        preloadPromise = null;
        return settings;
      },
      (error: unknown) => {
        preloadPromise = null;
        throw error;
      }
    );
  }
  return preloadPromise;
}

/**
 * Current settings (loads and caches on first call)
 */
export function getSettings(): BurrowSettings {
  if (!cachedSettings) {
    cachedSettings = loadSettings(customSettingsPath);
  }
  return cachedSettings;
}

export async function reloadSettings(): Promise<BurrowSettings> {
  cachedSettings = await loadSettingsAsync(customSettingsPath);
  return cachedSettings;
}

/**
 * Set a custom settings path (mainly for testing). Clears the cache.
 */
export function setSettingsPath(settingsPath: string | undefined): void {
  customSettingsPath = settingsPath;
  clearSettingsCache();
}

export function clearSettingsCache(): void {
  cachedSettings = null;
  preloadPromise = null;
}

/**
 * @fileoverview Settings exports
 */

export * from './types.js';
export { DEFAULT_SETTINGS, HEARTBEAT_PROMPT } from './defaults.js';
export {
  deepMerge,
  applyEnvOverrides,
  resolveSettings,
  resolveBurrowPath,
  getSettingsDir,
  getSettingsPath,
  loadSettings,
  loadSettingsAsync,
  saveSettings,
  preloadSettings,
  getSettings,
  reloadSettings,
  setSettingsPath,
  clearSettingsCache,
} from './loader.js';

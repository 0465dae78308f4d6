/**
 * @fileoverview Settings loader tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  applyEnvOverrides,
  clearSettingsCache,
  deepMerge,
  getSettings,
  loadSettings,
  loadSettingsAsync,
  preloadSettings,
  resolveBurrowPath,
  resolveSettings,
  saveSettings,
  setSettingsPath,
} from '../../src/settings/loader.js';
import { DEFAULT_SETTINGS } from '../../src/settings/defaults.js';
import { SettingsValidationError } from '../../src/utils/errors.js';

describe('deepMerge', () => {
  it('should merge nested objects and replace arrays', () => {
    const merged = deepMerge(
      { a: { x: 1, y: 2 }, list: [1, 2], keep: true },
      { a: { y: 3 }, list: [9], extra: 'new' }
    );

    expect(merged).toEqual({ a: { x: 1, y: 3 }, list: [9], keep: true, extra: 'new' });
  });

  it('should ignore undefined source values', () => {
    expect(deepMerge({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
  });
});

describe('applyEnvOverrides', () => {
  it('should set the mapped setting for each variable present', () => {
    const result = applyEnvOverrides(
      { model: { model: 'a', apiKey: '' } },
      { BURROW_MODEL: 'b', BURROW_API_KEY: 'test-secret', BURROW_DATA_DIR: '/srv/burrow' }
    );

    expect(result).toEqual({
      model: { model: 'b', apiKey: 'test-secret' },
      persistence: { dataDir: '/srv/burrow' },
    });
  });

  it('should skip empty variables', () => {
    expect(applyEnvOverrides({ model: { model: 'a' } }, { BURROW_MODEL: '' })).toEqual({ model: { model: 'a' } });
  });
});

describe('resolveSettings', () => {
  it('should return the defaults for no user settings', () => {
    expect(resolveSettings(null, 'test', {})).toEqual(DEFAULT_SETTINGS);
  });

  it('should merge user values over the defaults', () => {
    const settings = resolveSettings({ memory: { consolidationThreshold: 40 } }, 'test', {});

    expect(settings.memory.consolidationThreshold).toBe(40);
    expect(settings.memory.keepRecentRatio).toBe(0.2);
    expect(settings.agent.maxToolRounds).toBe(20);
  });

  it('should coerce numeric environment overrides', () => {
    const settings = resolveSettings(null, 'test', {
      BURROW_CONSOLIDATION_THRESHOLD: '50',
      BURROW_MAX_TOOL_ROUNDS: '5',
    });

    expect(settings.memory.consolidationThreshold).toBe(50);
    expect(settings.agent.maxToolRounds).toBe(5);
  });

  it('should reject out-of-range values', () => {
    expect(() => resolveSettings({ memory: { consolidationThreshold: 1 } }, 'settings.json', {})).toThrow(
      SettingsValidationError
    );
    expect(() => resolveSettings({ memory: { keepRecentRatio: 0 } }, 'settings.json', {})).toThrow(
      SettingsValidationError
    );
    expect(() => resolveSettings(null, 'env', { BURROW_MAX_TOOL_ROUNDS: 'lots' })).toThrow(SettingsValidationError);
  });

  it('should name the offending setting', () => {
    try {
      resolveSettings({ persistence: { readBlockSize: 16 } }, 'settings.json', {});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SettingsValidationError);
      if (error instanceof SettingsValidationError) {
        expect(error.issues[0]).toMatch(/^persistence\.readBlockSize: /);
      }
    }
  });
});

describe('resolveBurrowPath', () => {
  it('should expand the home directory', () => {
    expect(resolveBurrowPath('~', '/home/test')).toBe('/home/test');
    expect(resolveBurrowPath('~/.burrow/workspace', '/home/test')).toBe(path.join('/home/test', '.burrow/workspace'));
  });

  it('should resolve other paths to absolute ones', () => {
    expect(resolveBurrowPath('/srv/data', '/home/test')).toBe('/srv/data');
    expect(path.isAbsolute(resolveBurrowPath('relative/dir'))).toBe(true);
  });
});

describe('settings file', () => {
  let testDir: string;
  let settingsPath: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'burrow-settings-'));
    settingsPath = path.join(testDir, 'settings.json');
  });

  afterEach(async () => {
    setSettingsPath(undefined);
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('should use defaults when the file is missing', async () => {
    expect((await loadSettingsAsync(settingsPath)).model.model).toBe(DEFAULT_SETTINGS.model.model);
    expect(loadSettings(settingsPath).agent.workspace).toBe(DEFAULT_SETTINGS.agent.workspace);
  });

  it('should use defaults when the file is not valid JSON', async () => {
    await fs.writeFile(settingsPath, '{ broken');

    expect((await loadSettingsAsync(settingsPath)).memory.consolidationThreshold).toBe(100);
  });

  it('should read saved settings back', async () => {
    await saveSettings({ model: { model: 'local-model' }, heartbeat: { enabled: true } }, settingsPath);

    const settings = await loadSettingsAsync(settingsPath);

    expect(settings.model.model).toBe('local-model');
    expect(settings.heartbeat.enabled).toBe(true);
    expect(settings.heartbeat.intervalMs).toBe(DEFAULT_SETTINGS.heartbeat.intervalMs);
  });

  it('should cache settings until the cache is cleared', async () => {
    await saveSettings({ model: { model: 'first' } }, settingsPath);
    setSettingsPath(settingsPath);

    expect((await preloadSettings()).model.model).toBe('first');

    await saveSettings({ model: { model: 'second' } }, settingsPath);
    expect(getSettings().model.model).toBe('first');

    clearSettingsCache();
    expect(getSettings().model.model).toBe('second');
  });
});

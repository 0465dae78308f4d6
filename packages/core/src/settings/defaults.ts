/**
 * @fileoverview Default settings
 *
 * Fallback for every setting the user file leaves out. Paths starting with
 * `~` are expanded by the loader.
 */

import type { BurrowSettings } from './types.js';

export const HEARTBEAT_PROMPT =
  'Read HEARTBEAT.md in your workspace if it exists and follow any instructions in it. ' +
  'Do not infer tasks from earlier conversations. ' +
  'If nothing needs attention, reply with exactly HEARTBEAT_OK.';

export const DEFAULT_SETTINGS: BurrowSettings = {
  version: '0.1.0',
  name: 'burrow',

  model: {
    apiBase: 'https://api.openai.com/v1',
    apiKey: '',
    model: 'gpt-4o-mini',
    maxTokens: 8192,
  },

  agent: {
    workspace: '~/.burrow/workspace',
    systemPromptFile: 'AGENTS.md',
    maxToolRounds: 20,
    typingIntervalMs: 4000,
  },

  memory: {
    consolidationThreshold: 100,
    keepRecentRatio: 0.2,
    summaryWordLimit: 600,
    ownerAliases: [],
  },

  persistence: {
    dataDir: '~/.burrow',
    readBlockSize: 64 * 1024,
  },

  scheduler: {
    pollIntervalMs: 60_000,
  },

  heartbeat: {
    enabled: false,
    intervalMs: 30 * 60_000,
    prompt: HEARTBEAT_PROMPT,
  },

  skills: {
    extraDirs: [],
  },
};

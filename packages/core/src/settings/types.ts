/**
 * @fileoverview Settings schema
 *
 * The zod schema is the single source of truth for setting names, types
 * and bounds. Types are inferred from it.
 */

import { z } from 'zod';

export const OwnerAliasSchema = z.object({
  /** Sender id or address that identifies the owner */
  address: z.string().min(1),
  /** Restrict the alias to one channel; omitted means any channel */
  channel: z.string().min(1).optional(),
});

export const ModelSettingsSchema = z.object({
  apiBase: z.string().url(),
  apiKey: z.string(),
  model: z.string().min(1),
  maxTokens: z.coerce.number().int().positive(),
});

export const AgentSettingsSchema = z.object({
  /** Directory holding AGENTS.md, HEARTBEAT.md and workspace skills */
  workspace: z.string().min(1),
  systemPromptFile: z.string().min(1),
  maxToolRounds: z.coerce.number().int().positive(),
  typingIntervalMs: z.coerce.number().int().positive(),
});

export const MemorySettingsSchema = z.object({
  /** Unconsolidated message count that triggers summarization */
  consolidationThreshold: z.coerce.number().int().min(2),
  /** Fraction of the threshold kept verbatim after consolidation */
  keepRecentRatio: z.coerce.number().gt(0).lte(1),
  summaryWordLimit: z.coerce.number().int().positive(),
  ownerAliases: z.array(OwnerAliasSchema),
});

export const PersistenceSettingsSchema = z.object({
  dataDir: z.string().min(1),
  /** Block size for tail reads of history logs, in bytes */
  readBlockSize: z.coerce.number().int().min(256),
});

export const SchedulerSettingsSchema = z.object({
  pollIntervalMs: z.coerce.number().int().positive(),
});

export const HeartbeatSettingsSchema = z.object({
  enabled: z.boolean(),
  intervalMs: z.coerce.number().int().positive(),
  prompt: z.string().min(1),
});

export const SkillsSettingsSchema = z.object({
  /** Additional skill directories, highest priority first */
  extraDirs: z.array(z.string()),
});

export const SettingsSchema = z.object({
  version: z.string(),
  name: z.string(),
  model: ModelSettingsSchema,
  agent: AgentSettingsSchema,
  memory: MemorySettingsSchema,
  persistence: PersistenceSettingsSchema,
  scheduler: SchedulerSettingsSchema,
  heartbeat: HeartbeatSettingsSchema,
  skills: SkillsSettingsSchema,
});

export type OwnerAlias = z.infer<typeof OwnerAliasSchema>;
export type ModelSettings = z.infer<typeof ModelSettingsSchema>;
export type AgentSettings = z.infer<typeof AgentSettingsSchema>;
export type MemorySettings = z.infer<typeof MemorySettingsSchema>;
export type PersistenceSettings = z.infer<typeof PersistenceSettingsSchema>;
export type SchedulerSettings = z.infer<typeof SchedulerSettingsSchema>;
export type HeartbeatSettings = z.infer<typeof HeartbeatSettingsSchema>;
export type SkillsSettings = z.infer<typeof SkillsSettingsSchema>;
export type BurrowSettings = z.infer<typeof SettingsSchema>;

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[]
    ? U[]
    : T[P] extends object
      ? DeepPartial<T[P]>
      : T[P];
};

export type UserSettings = DeepPartial<BurrowSettings>;

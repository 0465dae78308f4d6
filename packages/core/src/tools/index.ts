/**
 * @fileoverview Tools module exports
 */

export { ToolRegistry, executeTool } from './registry.js';
export { MemoryWriteTool } from './memory-write.js';
export { SearchHistoryTool, type SearchHistoryToolConfig } from './search-history.js';
export {
  CronListTool,
  CronAddTool,
  CronRemoveTool,
  CronSetEnabledTool,
  buildCronTools,
  type CronAddToolConfig,
} from './cron.js';
export { SpawnTool, SpawnAwaitTool, SpawnJobTracker, buildSpawnTools } from './spawn.js';
export { parseToolArgs, toolError, toolOk, truncateText, type ParsedToolArgs } from './utils.js';

/**
 * @fileoverview Memory exports
 */

export {
  MemoryManager,
  createMemoryManager,
  MEMORY_HEADING,
  SUMMARY_HEADING,
  CONSOLIDATION_WARNING,
  type MemoryManagerConfig,
  type SessionSnapshot,
  type ConsolidationResult,
} from './manager.js';
export { OwnerMatcher, labelMessage, ASSISTANT_SENDER } from './labels.js';
export {
  CONSOLIDATION_SYSTEM_PROMPT,
  keepRecentCount,
  summarySentenceBudget,
  buildTranscript,
  buildConsolidationMessages,
  mergeSummary,
  requestSummary,
} from './consolidation.js';

/**
 * @fileoverview Persistence exports
 */

export { JsonlStore, createJsonlStore, type JsonlStoreConfig } from './jsonl-store.js';
export { DataLayout, safeSessionId, sessionIdFromSafe } from './paths.js';
export {
  MessageRecordSchema,
  ScheduledJobRecordSchema,
  JobsFileSchema,
  decodeMessageLine,
  encodeMessageLine,
  type DecodeResult,
} from './records.js';
export { scanForward, scanBackward, type ScanStats } from './line-scanner.js';

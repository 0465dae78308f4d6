/**
 * @fileoverview Main entry point for @burrow/core
 *
 * Burrow core: agent loop, memory, persistence, tools, skills and scheduling
 */

// Re-export all types
export * from './types/index.js';

export * from './logging/index.js';
export * from './utils/index.js';
export * from './settings/index.js';
export * from './persistence/index.js';
export * from './tools/index.js';
export * from './skills/index.js';
export * from './memory/index.js';
export * from './agent/index.js';
export * from './scheduler/index.js';

// Version info
export const VERSION = '0.1.0';
export const NAME = 'burrow';

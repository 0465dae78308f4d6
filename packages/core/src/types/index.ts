/**
 * @fileoverview Type exports
 */

export * from './messages.js';
export * from './session.js';
export * from './tools.js';
export * from './jobs.js';
export * from './ports.js';

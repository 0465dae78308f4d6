/**
 * @fileoverview Skills exports
 */

export type { SkillMetadata } from './types.js';
export { parseSkillMd, type ParsedSkillMd, type SkillFrontmatter } from './parser.js';
export { FsSkillsLoader, createSkillsLoader, isOnPath, type FsSkillsLoaderConfig } from './loader.js';
export { buildSkillsXml } from './xml.js';

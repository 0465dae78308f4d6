/**
 * @fileoverview Filesystem skills loader
 *
 * Discovers `<dir>/<name>/SKILL.md` across search directories in priority
 * order; a skill name found in an earlier directory shadows later ones.
 * Parsed metadata is cached per file and re-read only when its mtime changes.
 */

import { access, readdir, readFile, stat } from 'node:fs/promises';
import { constants } from 'node:fs';
import * as path from 'node:path';
import type { SkillsPort } from '../types/ports.js';
import type { SkillMetadata } from './types.js';
import { parseSkillMd } from './parser.js';
import { createLogger } from '../logging/logger.js';
import { errorMessage } from '../utils/errors.js';
import { isNotFoundError } from '../utils/atomic-write.js';

const logger = createLogger('skills');

const SKILL_FILE = 'SKILL.md';

export interface FsSkillsLoaderConfig {
  /** Directories to search, highest priority first */
  searchDirs: string[];
  env?: NodeJS.ProcessEnv;
}

interface CacheEntry {
  mtimeMs: number;
  skill: SkillMetadata;
}

/**
 * Whether an executable named `bin` exists on PATH
 */
export async function isOnPath(bin: string, env: NodeJS.ProcessEnv = process.env): Promise<boolean> {
  const dirs = (env.PATH ?? '').split(path.delimiter).filter(Boolean);
  for (const dir of dirs) {
    try {
      await access(path.join(dir, bin), constants.X_OK);
      return true;
    } catch {
      // not in this directory
    }
  }
  return false;
}

export class FsSkillsLoader implements SkillsPort {
  private readonly searchDirs: string[];
  private readonly env: NodeJS.ProcessEnv;
  private readonly cache = new Map<string, CacheEntry>();

  constructor(config: FsSkillsLoaderConfig) {
    this.searchDirs = config.searchDirs;
    this.env = config.env ?? process.env;
  }

  async listSkills(): Promise<SkillMetadata[]> {
    const seen = new Map<string, SkillMetadata>();

    for (const dir of this.searchDirs) {
      for (const name of await this.listSkillDirs(dir)) {
        if (seen.has(name)) continue;
        const skill = await this.loadCached(path.join(dir, name, SKILL_FILE), name);
        if (skill) seen.set(name, skill);
      }
    }

    return [...seen.values()];
  }

  async loadSkillBody(name: string): Promise<string> {
    for (const dir of this.searchDirs) {
      try {
        return await readFile(path.join(dir, name, SKILL_FILE), 'utf8');
      } catch (error) {
        if (!isNotFoundError(error)) throw error;
      }
    }
    throw new Error(`Skill '${name}' not found`);
  }

  private async listSkillDirs(dir: string): Promise<string[]> {
    try {
      const entries = await readdir(dir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (isNotFoundError(error)) return [];
      throw error;
    }
  }

  private async loadCached(filePath: string, dirName: string): Promise<SkillMetadata | null> {
    let mtimeMs: number;
    try {
      mtimeMs = (await stat(filePath)).mtimeMs;
    } catch (error) {
      if (isNotFoundError(error)) return null;
      throw error;
    }

    const cached = this.cache.get(filePath);
    if (cached && cached.mtimeMs === mtimeMs) {
      return cached.skill;
    }

    let skill: SkillMetadata;
    try {
      skill = await this.parse(filePath, dirName);
    } catch (error) {
      logger.warn('Skipping unreadable skill', { filePath, error: errorMessage(error) });
      return null;
    }
    this.cache.set(filePath, { mtimeMs, skill });
    return skill;
  }

  private async parse(filePath: string, dirName: string): Promise<SkillMetadata> {
    const { frontmatter } = parseSkillMd(await readFile(filePath, 'utf8'));

    const bins = frontmatter.requires?.bins ?? [];
    const envs = frontmatter.requires?.env ?? [];
    const missingBins: string[] = [];
    for (const bin of bins) {
      if (!(await isOnPath(bin, this.env))) missingBins.push(bin);
    }
    const missingEnv = envs.filter((name) => !this.env[name]);

    return {
      name: frontmatter.name ?? dirName,
      description: frontmatter.description ?? '',
      location: filePath,
      always: frontmatter.always ?? false,
      available: missingBins.length === 0 && missingEnv.length === 0,
      requiresBins: missingBins,
      requiresEnv: missingEnv,
      emoji: frontmatter.metadata?.burrow?.emoji ?? '',
    };
  }
}

export function createSkillsLoader(config: FsSkillsLoaderConfig): FsSkillsLoader {
  return new FsSkillsLoader(config);
}

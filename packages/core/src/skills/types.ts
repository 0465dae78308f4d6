/**
 * @fileoverview Skill types
 *
 * A skill is a directory containing a SKILL.md file: YAML frontmatter
 * describing it, followed by Markdown instructions for the model.
 */

export interface SkillMetadata {
  name: string;
  description: string;
  /** Absolute path to SKILL.md */
  location: string;
  /** Inject the full body into every system prompt */
  always: boolean;
  /** False when required binaries or environment variables are missing */
  available: boolean;
  /** Missing binaries */
  requiresBins: string[];
  /** Missing environment variables */
  requiresEnv: string[];
  emoji: string;
}

/**
 * @fileoverview SKILL.md frontmatter parsing
 */

import matter from 'gray-matter';
import { z } from 'zod';

const FrontmatterSchema = z
  .object({
    name: z.string().optional(),
    description: z.string().optional(),
    always: z.boolean().optional(),
    requires: z
      .object({
        bins: z.array(z.string()).optional(),
        env: z.array(z.string()).optional(),
      })
      .nullish(),
    metadata: z
      .object({
        burrow: z.object({ emoji: z.string().optional() }).passthrough().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export type SkillFrontmatter = z.infer<typeof FrontmatterSchema>;

export interface ParsedSkillMd {
  frontmatter: SkillFrontmatter;
  /** Markdown after the frontmatter */
  body: string;
}

/**
 * Split a SKILL.md into frontmatter and body. Throws on YAML that does not
 * parse or does not match the expected shape.
 */
export function parseSkillMd(raw: string): ParsedSkillMd {
  const { data, content } = matter(raw);
  const parsed = FrontmatterSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid skill frontmatter at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'unknown'}`);
  }
  return { frontmatter: parsed.data, body: content.trim() };
}

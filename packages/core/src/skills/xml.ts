/**
 * @fileoverview Skills index for the system prompt
 */

import type { SkillMetadata } from './types.js';

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function requiresHint(skill: SkillMetadata): string {
  const hints: string[] = [];
  if (skill.requiresBins.length > 0) hints.push(`CLI: ${skill.requiresBins.join(', ')}`);
  if (skill.requiresEnv.length > 0) hints.push(`env: ${skill.requiresEnv.join(', ')}`);
  return hints.join('; ');
}

/**
 * Render the `<skills>` block. Always-on skills are left out: their bodies
 * are injected in full instead. Returns '' when nothing is listed.
 */
export function buildSkillsXml(skills: readonly SkillMetadata[]): string {
  const listed = skills.filter((skill) => !skill.always);
  if (listed.length === 0) return '';

  const lines = ['<skills>'];
  for (const skill of listed) {
    lines.push(`  <skill available="${skill.available}">`);
    lines.push(`    <name>${escapeXml(skill.name)}</name>`);
    lines.push(`    <description>${escapeXml(skill.description)}</description>`);
    lines.push(`    <location>${escapeXml(skill.location)}</location>`);
    if (!skill.available) {
      lines.push(`    <requires>${escapeXml(requiresHint(skill))}</requires>`);
    }
    lines.push('  </skill>');
  }
  lines.push('</skills>');
  return lines.join('\n');
}

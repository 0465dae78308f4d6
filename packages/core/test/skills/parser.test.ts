/**
 * @fileoverview SKILL.md parser tests
 */
import { describe, it, expect } from 'vitest';
import { parseSkillMd } from '../../src/skills/parser.js';

describe('parseSkillMd', () => {
  it('should split frontmatter and body', () => {
    const { frontmatter, body } = parseSkillMd(
      [
        '---',
        'name: weather',
        'description: Get the forecast',
        'always: false',
        'requires:',
        '  bins: [curl]',
        '  env: [WEATHER_TOKEN]',
        'metadata:',
        '  burrow:',
        '    emoji: "🌤"',
        '---',
        '',
        '# Weather',
        '',
        'Use curl.',
        '',
      ].join('\n')
    );

    expect(frontmatter.name).toBe('weather');
    expect(frontmatter.description).toBe('Get the forecast');
    expect(frontmatter.always).toBe(false);
    expect(frontmatter.requires).toEqual({ bins: ['curl'], env: ['WEATHER_TOKEN'] });
    expect(frontmatter.metadata?.burrow?.emoji).toBe('🌤');
    expect(body).toBe('# Weather\n\nUse curl.');
  });

  it('should accept a file without frontmatter', () => {
    const { frontmatter, body } = parseSkillMd('Just instructions.\n');

    expect(frontmatter).toEqual({});
    expect(body).toBe('Just instructions.');
  });

  it('should reject frontmatter of the wrong shape', () => {
    expect(() => parseSkillMd('---\nalways: sometimes\n---\nbody')).toThrow(/^Invalid skill frontmatter at always: /);
  });
});

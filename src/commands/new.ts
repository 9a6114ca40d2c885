import { existsSync } from 'fs';
import { basename } from 'path';
import { writeSourceSkill } from '../utils/apply.js';
import { SkillsError } from '../utils/errors.js';
import { accent, dim, success } from '../utils/palette.js';
import { displayPath, expandPath } from '../utils/paths.js';
import { withPaths } from './shared.js';
import type { CommandDeps } from './shared.js';

function titleCase(name: string): string {
  return name
    .split(/[-_\s]+/)
    .filter(Boolean)
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Starter SKILL.md for a new skill
 */
export function skillTemplate(name: string): string {
  return [
    '---',
    `name: ${name}`,
    `description: Describe when the agent should use ${name}.`,
    '---',
    '',
    `# ${titleCase(name)}`,
    '',
    'Instructions for the agent go here.',
    '',
    '{% if tool == "codex" %}',
    'Codex-specific notes.',
    '{% endif %}',
    '',
  ].join('\n');
}

/**
 * Scaffold a new skill directory containing a SKILL.md template
 */
export async function newSkill(path: string, deps: CommandDeps = {}): Promise<string> {
  const paths = withPaths(deps);
  const skillDir = expandPath(path, paths.cwd(), paths);
  if (existsSync(skillDir)) {
    throw new SkillsError('invalid', `Path already exists: ${skillDir}`, { path: skillDir });
  }

  const name = basename(skillDir);
  const written = writeSourceSkill(skillDir, skillTemplate(name));
  console.log(success('✓ Created') + ` ${displayPath(written, paths)}`);
  console.log(`\n${dim('Install it with:')} ${accent(`skillsync push ${name}`)}`);
  return written;
}

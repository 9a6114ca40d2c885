import { existsSync } from 'fs';
import type { InstalledSkill, PromoteOptions } from '../types.js';
import { moveSkillDir, skillDirIn } from '../utils/apply.js';
import { SkillsError } from '../utils/errors.js';
import { accent, dim, label, skillName, success } from '../utils/palette.js';
import { displayPath } from '../utils/paths.js';
import { globalSkillsDir, toolsFor } from '../utils/tools.js';
import { withCatalog } from './shared.js';
import type { CommandDeps } from './shared.js';

/**
 * Move a project-local skill into the tool's user-wide skills directory
 */
export async function promoteSkill(name: string, options: PromoteOptions, deps: CommandDeps = {}): Promise<string[]> {
  return withCatalog(deps, async ({ catalog, paths }) => {
    const matches = toolsFor(options.tool)
      .map((tool) => catalog.locals[tool].get(name))
      .filter((skill): skill is InstalledSkill => skill !== undefined);

    if (matches.length === 0) {
      throw new SkillsError('not-found', `Project skill not found: ${name}`);
    }
    if (matches.length > 1 && options.tool === 'all') {
      const tools = matches.map((skill) => skill.tool).join(', ');
      throw new SkillsError('invalid', `Skill '${name}' exists for several tools (${tools}); choose one with --tool`);
    }

    const promoted: string[] = [];
    for (const skill of matches) {
      const existing = catalog.installs[skill.tool].get(name);
      const target = existing ? existing.skillDir : skillDirIn(globalSkillsDir(skill.tool, paths), name);
      if ((existing || existsSync(target)) && !options.force) {
        throw new SkillsError(
          'conflict',
          `Skill '${name}' already exists at ${displayPath(target, paths)}; use --force to replace it`
        );
      }

      const from = displayPath(skill.skillDir, paths);
      const to = displayPath(target, paths);
      const verb = options.dryRun ? 'Would promote' : 'Promoting';
      console.log(`${label(verb)} '${skillName(name)}' from ${from} to ${to}`);
      if (options.dryRun) continue;

      moveSkillDir(skill.skillDir, target, options.force);
      promoted.push(target);
    }

    if (options.dryRun) {
      console.log(dim('\nDry run: nothing moved.'));
    } else {
      console.log(success('\n✓ Done.') + ' To manage this skill from a source directory, run:');
      console.log(accent(`  skillsync pull ${name} --to <source-dir>`));
    }
    return promoted;
  });
}

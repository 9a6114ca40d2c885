import { existsSync } from 'fs';
import { dirname } from 'path';
import { TOOLS } from '../types.js';
import type { Catalog, InstalledSkill, MoveOptions, Tool } from '../types.js';
import { moveSkillDir, removeInstalledSkill, skillDirIn, writeSourceSkill } from '../utils/apply.js';
import { SkillsError, promptCanceled, skillNotFound } from '../utils/errors.js';
import { setFrontmatterName } from '../utils/frontmatter.js';
import { dim, label, skillName, success } from '../utils/palette.js';
import { displayPath } from '../utils/paths.js';
import type { PathProvider } from '../utils/paths.js';
import { withCatalog } from './shared.js';
import type { CommandDeps } from './shared.js';

export interface RenameOperation {
  label: 'source' | Tool;
  from: string;
  to: string;
  /** Current file contents, rewritten with the new name after the move */
  contents: string;
}

/**
 * The source folder plus every global install of the skill, each renamed in place
 */
export function planRename(catalog: Catalog, oldName: string, newName: string): RenameOperation[] {
  const source = catalog.sources.get(oldName);
  if (!source) throw skillNotFound(oldName);
  if (oldName === newName) {
    throw new SkillsError('invalid', `Skill '${oldName}' already has that name`);
  }

  const operations: RenameOperation[] = [
    {
      label: 'source',
      from: source.skillDir,
      to: skillDirIn(source.sourceRoot, newName),
      contents: source.contents,
    },
  ];
  for (const tool of TOOLS) {
    const installed = catalog.installs[tool].get(oldName);
    if (!installed) continue;
    operations.push({
      label: tool,
      from: installed.skillDir,
      to: skillDirIn(dirname(installed.skillDir), newName),
      contents: installed.contents,
    });
  }
  return operations;
}

function describeOperation(operation: RenameOperation, paths: PathProvider): string {
  return `  ${operation.label}: ${displayPath(operation.from, paths)} -> ${displayPath(operation.to, paths)}`;
}

/**
 * Rename a skill in its source and in every tool directory, updating the frontmatter name
 */
export async function moveSkill(
  oldName: string,
  newName: string,
  options: MoveOptions,
  deps: CommandDeps = {}
): Promise<RenameOperation[]> {
  return withCatalog(deps, async ({ catalog, confirm, paths }) => {
    const operations = planRename(catalog, oldName, newName);

    const replaced = TOOLS.map((tool) => catalog.installs[tool].get(newName)).filter(
      (installed): installed is InstalledSkill => installed !== undefined
    );
    if (!options.force) {
      const taken =
        catalog.sources.get(newName)?.skillDir ??
        replaced[0]?.skillDir ??
        operations.find((operation) => operation.to !== operation.from && existsSync(operation.to))?.to;
      if (taken) {
        throw new SkillsError(
          'conflict',
          `Skill '${newName}' already exists at ${displayPath(taken, paths)}; use --force to replace it`
        );
      }
    }

    const verb = options.dryRun ? 'Would rename' : 'Renaming';
    console.log(`${label(verb)} '${skillName(oldName)}' -> '${skillName(newName)}'`);
    console.log('');
    for (const operation of operations) {
      console.log(describeOperation(operation, paths));
    }

    if (options.dryRun) {
      console.log(dim('\nDry run: nothing renamed.'));
      return [];
    }

    if (!options.force) {
      console.log('');
      const decision = await confirm(`Rename ${operations.length} location(s)?`);
      if (decision === 'cancel') throw promptCanceled();
      if (decision === 'decline') {
        console.log(dim('Aborted.'));
        return [];
      }
    }

    for (const installed of replaced) {
      removeInstalledSkill(installed.skillDir);
    }
    for (const operation of operations) {
      if (operation.to !== operation.from) {
        moveSkillDir(operation.from, operation.to, options.force);
      }
      writeSourceSkill(operation.to, setFrontmatterName(operation.contents, newName));
    }

    console.log('');
    console.log(success(`✓ Renamed ${operations.length} location(s).`));
    return operations;
  });
}

import { cpSync, existsSync, mkdirSync, renameSync, rmSync, writeFileSync } from 'fs';
import { dirname, join, resolve, sep } from 'path';
import type { InstalledSkill, SyncOutcome, SyncPlan, Tool } from '../types.js';
import { SkillsError, errorMessage } from './errors.js';
import type { PathProvider } from './paths.js';
import { renderSkillOrThrow } from './render.js';
import { SKILL_FILE_NAME } from './skills.js';
import { globalSkillsDir } from './tools.js';

function ensureDir(dir: string): void {
  try {
    mkdirSync(dir, { recursive: true });
  } catch (error) {
    throw new SkillsError('io', `Failed to create directory ${dir}: ${errorMessage(error)}`, {
      path: dir,
      cause: error,
    });
  }
}

function writeSkillFile(skillDir: string, contents: string): string {
  ensureDir(skillDir);
  const skillPath = join(skillDir, SKILL_FILE_NAME);
  try {
    writeFileSync(skillPath, contents, 'utf-8');
  } catch (error) {
    throw new SkillsError('io', `Failed to write skill file at ${skillPath}: ${errorMessage(error)}`, {
      path: skillPath,
      cause: error,
    });
  }
  return skillPath;
}

/**
 * Resolve <root>/<name>, refusing names that escape the root
 */
export function skillDirIn(root: string, name: string): string {
  const resolvedRoot = resolve(root);
  const skillDir = resolve(resolvedRoot, name);
  if (!skillDir.startsWith(resolvedRoot + sep)) {
    throw new SkillsError('invalid', `Skill name '${name}' resolves outside ${root}`, { path: skillDir });
  }
  return skillDir;
}

/**
 * Write rendered content over an existing install, wherever its directory is,
 * or to <root>/<name>/SKILL.md for a new one
 */
export function writeInstalledSkill(
  installRoot: string,
  name: string,
  contents: string,
  existing?: InstalledSkill
): string {
  return writeSkillFile(existing ? existing.skillDir : skillDirIn(installRoot, name), contents);
}

/**
 * Overwrite or create a source skill with raw content
 */
export function writeSourceSkill(skillDir: string, contents: string): string {
  return writeSkillFile(skillDir, contents);
}

export function removeInstalledSkill(skillDir: string): void {
  if (!existsSync(skillDir)) return;
  try {
    rmSync(skillDir, { recursive: true, force: true });
  } catch (error) {
    throw new SkillsError('io', `Failed to remove ${skillDir}: ${errorMessage(error)}`, {
      path: skillDir,
      cause: error,
    });
  }
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Move a skill directory, first removing the destination when `replace` is set
 */
export function moveSkillDir(from: string, to: string, replace = false): void {
  if (replace) removeInstalledSkill(to);
  ensureDir(dirname(to));
  try {
    renameSync(from, to);
  } catch (error) {
    if (!hasCode(error, 'EXDEV')) {
      throw new SkillsError('io', `Failed to move ${from} to ${to}: ${errorMessage(error)}`, {
        path: from,
        cause: error,
      });
    }
    // home and project on different filesystems
    try {
      cpSync(from, to, { recursive: true, dereference: true });
    } catch (copyError) {
      throw new SkillsError('io', `Failed to copy ${from} to ${to}: ${errorMessage(copyError)}`, {
        path: from,
        cause: copyError,
      });
    }
    removeInstalledSkill(from);
  }
}

function pushTemplate(plan: SyncPlan, template: string, tools: Tool[], paths: PathProvider, origin: string): void {
  for (const tool of tools) {
    const rendered = renderSkillOrThrow(template, tool, origin);
    const existing = plan.differing.find((copy) => copy.tool === tool);
    writeInstalledSkill(globalSkillsDir(tool, paths), plan.name, rendered, existing);
  }
}

/**
 * Perform the writes a sync plan calls for.
 *
 * A pull replaces the source with the tool's bytes verbatim; a following
 * push renders that new template for each remaining tool.
 */
export function applySyncPlan(plan: SyncPlan, paths: PathProvider): SyncOutcome {
  const { action } = plan;

  if (action.kind === 'push') {
    pushTemplate(plan, plan.source.contents, action.toTools, paths, plan.source.skillPath);
    return { name: plan.name, pushed: action.toTools };
  }

  const pulled = plan.differing.find((copy) => copy.tool === action.fromTool);
  if (!pulled) {
    throw new SkillsError('not-found', `No ${action.fromTool} copy of '${plan.name}' to pull from`);
  }
  writeSourceSkill(plan.source.skillDir, pulled.contents);

  if (action.kind === 'pull') {
    return { name: plan.name, pushed: [], pulledFrom: action.fromTool };
  }

  pushTemplate(plan, pulled.contents, action.toTools, paths, pulled.skillPath);
  return { name: plan.name, pushed: action.toTools, pulledFrom: action.fromTool };
}

import { existsSync, readFileSync, statSync } from 'fs';
import { join } from 'path';
import type { InstalledSkill, SkillMetadata, SkillOrigin, SourceSkill, Tool } from '../types.js';
import type { Diagnostics } from './diagnostics.js';
import { errorMessage } from './errors.js';
import { parseFrontmatter } from './frontmatter.js';

export const SKILL_FILE_NAME = 'SKILL.md';

interface LoadedSkillFile {
  metadata: SkillMetadata;
  skillPath: string;
  contents: string;
}

function isSkillFile(skillPath: string): boolean {
  try {
    return existsSync(skillPath) && statSync(skillPath).isFile();
  } catch {
    return false;
  }
}

/**
 * Last-modified time in epoch milliseconds; the epoch when metadata is unavailable
 */
export function modifiedTime(path: string): number {
  try {
    return statSync(path).mtimeMs;
  } catch {
    return 0;
  }
}

function readSkillFile(skillDir: string, diagnostics: Diagnostics): LoadedSkillFile | null {
  const skillPath = join(skillDir, SKILL_FILE_NAME);
  if (!isSkillFile(skillPath)) {
    return null;
  }

  let contents: string;
  try {
    contents = readFileSync(skillPath, 'utf-8');
  } catch (error) {
    diagnostics.skip(skillPath, errorMessage(error));
    return null;
  }

  try {
    return { metadata: parseFrontmatter(contents), skillPath, contents };
  } catch (error) {
    diagnostics.skip(skillPath, errorMessage(error));
    return null;
  }
}

/**
 * Load a canonical skill from a source root subdirectory
 */
export function loadSourceSkill(
  sourceRoot: string,
  skillDir: string,
  diagnostics: Diagnostics
): SourceSkill | null {
  const loaded = readSkillFile(skillDir, diagnostics);
  if (!loaded) {
    return null;
  }

  return {
    ...loaded.metadata,
    sourceRoot,
    skillDir,
    skillPath: loaded.skillPath,
    contents: loaded.contents,
    modified: modifiedTime(loaded.skillPath),
  };
}

/**
 * Load a skill copy from a tool's global or project skills directory
 */
export function loadInstalledSkill(
  skillDir: string,
  tool: Tool,
  origin: SkillOrigin,
  diagnostics: Diagnostics
): InstalledSkill | null {
  const loaded = readSkillFile(skillDir, diagnostics);
  if (!loaded) {
    return null;
  }

  return {
    ...loaded.metadata,
    tool,
    origin,
    skillDir,
    skillPath: loaded.skillPath,
    contents: loaded.contents,
    modified: modifiedTime(loaded.skillPath),
  };
}

import { readdirSync } from 'fs';
import type { Dirent } from 'fs';
import { join } from 'path';
import { TOOLS } from '../types.js';
import type { Catalog, InstalledSkill, SkillOrigin, SourceConflict, SourceSkill, Tool } from '../types.js';
import type { Diagnostics } from './diagnostics.js';
import { errorMessage } from './errors.js';
import { displayPath } from './paths.js';
import type { PathProvider } from './paths.js';
import { loadInstalledSkill, loadSourceSkill } from './skills.js';
import { globalSkillsDir, localSkillsDir, toolTable } from './tools.js';

export interface LoadCatalogOptions {
  /** Source roots in priority order */
  sources: string[];
  paths: PathProvider;
  diagnostics: Diagnostics;
}

type MissingDirPolicy = 'warn' | 'silent';

interface ReadDirPolicy {
  missing: MissingDirPolicy;
  failure: MissingDirPolicy;
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * List skill directories under root, sorted by name; null when unreadable
 */
function readSkillDirs(root: string, policy: ReadDirPolicy, diagnostics: Diagnostics): string[] | null {
  let entries: Dirent[];
  try {
    entries = readdirSync(root, { withFileTypes: true });
  } catch (error) {
    if (hasCode(error, 'ENOENT')) {
      if (policy.missing === 'warn') {
        diagnostics.warn(`source directory not found: ${root}`);
      }
      return null;
    }
    if (policy.failure === 'warn') {
      diagnostics.warn(`failed to read directory ${root}: ${errorMessage(error)}`);
    }
    return null;
  }

  return entries
    .filter((entry) => !entry.name.startsWith('.') && (entry.isDirectory() || entry.isSymbolicLink()))
    .map((entry) => entry.name)
    .sort(compareNames)
    .map((name) => join(root, name));
}

function loadSources(options: LoadCatalogOptions): {
  sources: Map<string, SourceSkill>;
  conflicts: SourceConflict[];
} {
  const { diagnostics } = options;
  const sources = new Map<string, SourceSkill>();
  const collisions = new Map<string, string[]>();

  for (const sourceRoot of options.sources) {
    const dirs = readSkillDirs(sourceRoot, { missing: 'warn', failure: 'warn' }, diagnostics);
    if (!dirs) continue;

    for (const skillDir of dirs) {
      const skill = loadSourceSkill(sourceRoot, skillDir, diagnostics);
      if (!skill) continue;

      const existing = sources.get(skill.name);
      if (existing) {
        const paths = collisions.get(skill.name) ?? [existing.skillDir];
        paths.push(skill.skillDir);
        collisions.set(skill.name, paths);
        continue;
      }
      sources.set(skill.name, skill);
    }
  }

  const conflicts: SourceConflict[] = [];
  for (const [name, paths] of collisions) {
    const primary = sources.get(name);
    if (!primary) continue;
    diagnostics.warn(
      `skill '${name}' exists in multiple sources, using ${displayPath(primary.sourceRoot, options.paths)}`
    );
    for (const path of paths) {
      diagnostics.note(`  - ${displayPath(path, options.paths)}`);
    }
    conflicts.push({ name, paths });
  }

  return { sources, conflicts };
}

function loadToolDir(
  root: string,
  tool: Tool,
  origin: SkillOrigin,
  diagnostics: Diagnostics
): Map<string, InstalledSkill> {
  const skills = new Map<string, InstalledSkill>();
  const policy: ReadDirPolicy =
    origin === 'global' ? { missing: 'silent', failure: 'warn' } : { missing: 'silent', failure: 'silent' };
  const dirs = readSkillDirs(root, policy, diagnostics) ?? [];

  for (const skillDir of dirs) {
    const skill = loadInstalledSkill(skillDir, tool, origin, diagnostics);
    if (!skill || skills.has(skill.name)) continue;
    skills.set(skill.name, skill);
  }
  return skills;
}

function resolveDir(resolve: () => string, diagnostics: Diagnostics, warnOnFailure: boolean): string | null {
  try {
    return resolve();
  } catch (error) {
    if (warnOnFailure) {
      diagnostics.warn(errorMessage(error));
    }
    return null;
  }
}

/**
 * Scan source roots plus every tool's global and project skills directories.
 *
 * Never throws for a bad skill or an unreadable directory: problems go to
 * the diagnostics sink and the affected index is left empty.
 */
export function loadCatalog(options: LoadCatalogOptions): Catalog {
  const { paths, diagnostics } = options;
  const { sources, conflicts } = loadSources(options);

  const installs = toolTable((tool) => {
    const root = resolveDir(() => globalSkillsDir(tool, paths), diagnostics, true);
    return root ? loadToolDir(root, tool, 'global', diagnostics) : new Map<string, InstalledSkill>();
  });

  const locals = toolTable((tool) => {
    const root = resolveDir(() => localSkillsDir(tool, paths), diagnostics, false);
    return root ? loadToolDir(root, tool, 'local', diagnostics) : new Map<string, InstalledSkill>();
  });

  return { sources, installs, locals, conflicts };
}

/**
 * Every skill name known to the catalog: sources first, then installs, each sorted
 */
export function catalogNames(catalog: Catalog, options: { includeLocals?: boolean } = {}): string[] {
  const names: string[] = [...catalog.sources.keys()].sort(compareNames);
  const seen = new Set(names);

  const toolNames: string[] = [];
  for (const tool of TOOLS) {
    toolNames.push(...catalog.installs[tool].keys());
    if (options.includeLocals) {
      toolNames.push(...catalog.locals[tool].keys());
    }
  }
  for (const name of toolNames.sort(compareNames)) {
    if (seen.has(name)) continue;
    seen.add(name);
    names.push(name);
  }
  return names;
}

export function hasSkill(catalog: Catalog, name: string, options: { includeLocals?: boolean } = {}): boolean {
  return catalogNames(catalog, options).includes(name);
}

/**
 * Stable, case-insensitive ordering used for every listing
 */
export function sortByName<T extends { name: string }>(items: T[]): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => compareNames(a.item.name.toLowerCase(), b.item.name.toLowerCase()) || a.index - b.index)
    .map(({ item }) => item);
}

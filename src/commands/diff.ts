import { TOOLS } from '../types.js';
import type { InstalledSkill, SkillEntry, SourceSkill, Tool } from '../types.js';
import { hasSkill } from '../utils/catalog.js';
import { unifiedDiff } from '../utils/diff.js';
import { skillNotFound } from '../utils/errors.js';
import { colorizeDiff, dim, syncState } from '../utils/palette.js';
import { displayPath } from '../utils/paths.js';
import type { PathProvider } from '../utils/paths.js';
import { renderSkill } from '../utils/render.js';
import { classifySkills, stateFor } from '../utils/status.js';
import { toolDisplayName } from '../utils/tools.js';
import { withCatalog } from './shared.js';
import type { CommandDeps } from './shared.js';

function sourceDiff(source: SourceSkill, installed: InstalledSkill, tool: Tool, paths: PathProvider): string {
  const rendered = renderSkill(source.contents, tool);
  if (!rendered.ok) return '';
  return unifiedDiff(
    `source: ${displayPath(source.skillPath, paths)}`,
    `tool: ${displayPath(installed.skillPath, paths)}`,
    rendered.output,
    installed.contents
  );
}

/**
 * Section for one skill: header, a status line per tool, diffs for modified copies
 */
export function formatDiffSection(
  entry: SkillEntry,
  installs: (tool: Tool) => InstalledSkill | undefined,
  paths: PathProvider
): string {
  const lines = [`=== ${entry.name} ===`];
  for (const tool of TOOLS) {
    const state = stateFor(entry, tool);
    if (!state) continue;
    lines.push(`${toolDisplayName(tool)}: ${syncState(state)}`);

    const installed = installs(tool);
    if (state === 'modified' && entry.source && installed) {
      const diff = sourceDiff(entry.source, installed, tool, paths);
      if (diff) lines.push(colorizeDiff(diff.replace(/\n$/, '')));
    }
  }
  return lines.join('\n');
}

/**
 * Show diffs between rendered sources and installed tool copies
 */
export async function diffSkills(name: string | undefined, deps: CommandDeps = {}): Promise<void> {
  await withCatalog(deps, async ({ catalog, diagnostics, paths }) => {
    if (name !== undefined && !hasSkill(catalog, name)) {
      throw skillNotFound(name);
    }

    const entries = classifySkills(catalog, diagnostics).filter(
      (entry) => name === undefined || entry.name === name
    );
    if (entries.length === 0) {
      console.log(dim('No skills found.'));
      return;
    }

    const sections = entries.map((entry) =>
      formatDiffSection(entry, (tool) => catalog.installs[tool].get(entry.name), paths)
    );
    console.log(sections.join('\n\n'));
  });
}

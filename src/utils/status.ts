import { TOOLS } from '../types.js';
import type { Catalog, SkillEntry, Tool, ToolStatus } from '../types.js';
import { catalogNames, sortByName } from './catalog.js';
import type { Diagnostics } from './diagnostics.js';
import { renderSkill } from './render.js';

/**
 * Normalize line endings and drop at most one trailing newline
 */
export function normalizeContent(contents: string): string {
  const normalized = contents.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
  return normalized.endsWith('\n') ? normalized.slice(0, -1) : normalized;
}

export function contentsMatch(left: string, right: string): boolean {
  return normalizeContent(left) === normalizeContent(right);
}

/**
 * Classify every known skill against every tool's global install.
 *
 * A row whose source fails to render for any tool is dropped entirely.
 */
export function classifySkills(catalog: Catalog, diagnostics: Diagnostics): SkillEntry[] {
  const entries: SkillEntry[] = [];

  for (const name of catalogNames(catalog)) {
    const source = catalog.sources.get(name);
    const statuses: ToolStatus[] = [];
    let failed = false;

    for (const tool of TOOLS) {
      const installed = catalog.installs[tool].get(name);
      if (source && installed) {
        const rendered = renderSkill(source.contents, tool);
        if (!rendered.ok) {
          diagnostics.skip(source.skillPath, rendered.error);
          failed = true;
          break;
        }
        statuses.push({
          tool,
          state: contentsMatch(rendered.output, installed.contents) ? 'synced' : 'modified',
        });
      } else if (source) {
        statuses.push({ tool, state: 'missing' });
      } else if (installed) {
        statuses.push({ tool, state: 'orphan' });
      }
    }

    if (failed) continue;
    entries.push(source ? { name, source, statuses } : { name, statuses });
  }

  return sortByName(entries);
}

export function stateFor(entry: SkillEntry, tool: Tool): ToolStatus['state'] | undefined {
  return entry.statuses.find((status) => status.tool === tool)?.state;
}

/**
 * Tools that have a project-local copy of the named skill
 */
export function localSkillTools(catalog: Catalog, name: string): Tool[] {
  return TOOLS.filter((tool) => catalog.locals[tool].has(name));
}

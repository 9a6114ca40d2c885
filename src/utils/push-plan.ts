import type { Catalog, PushItem, PushStatus, SourceSkill, Tool } from '../types.js';
import { sortByName } from './catalog.js';
import type { Diagnostics } from './diagnostics.js';
import { skillNotFound } from './errors.js';
import { renderSkill } from './render.js';
import { contentsMatch } from './status.js';

export interface PushSelection {
  /** Explicit skill names; empty means every source skill */
  names: string[];
  tools: Tool[];
}

/**
 * Source skills named by the selection, in display order
 */
export function selectSourceSkills(catalog: Catalog, names: string[]): SourceSkill[] {
  if (names.length === 0) {
    return sortByName([...catalog.sources.values()]);
  }
  return names.map((name) => {
    const skill = catalog.sources.get(name);
    if (!skill) throw skillNotFound(name);
    return skill;
  });
}

/**
 * Compare each selected source skill with its install for each tool
 */
export function planPush(catalog: Catalog, selection: PushSelection, diagnostics: Diagnostics): PushItem[] {
  const items: PushItem[] = [];

  for (const skill of selectSourceSkills(catalog, selection.names)) {
    for (const tool of selection.tools) {
      const rendered = renderSkill(skill.contents, tool);
      if (!rendered.ok) {
        diagnostics.skip(skill.skillPath, rendered.error);
        continue;
      }

      const installed = catalog.installs[tool].get(skill.name);
      let status: PushStatus = 'new';
      if (installed) {
        status = contentsMatch(rendered.output, installed.contents) ? 'unchanged' : 'modified';
      }

      items.push(
        installed
          ? { skill, tool, status, rendered: rendered.output, installed }
          : { skill, tool, status, rendered: rendered.output }
      );
    }
  }

  return items;
}

export function needsWrite(item: PushItem): boolean {
  return item.status !== 'unchanged';
}

import { TOOLS } from '../types.js';
import type { SkillEntry, Tool } from '../types.js';
import { displayPath } from '../utils/paths.js';
import type { PathProvider } from '../utils/paths.js';
import { dim, skillName, syncState, toolTags } from '../utils/palette.js';
import { classifySkills, localSkillTools, stateFor } from '../utils/status.js';
import { withCatalog } from './shared.js';
import type { CommandDeps } from './shared.js';

const STATE_WIDTH = 9;

function formatStatus(entry: SkillEntry, tool: Tool): string {
  const state = stateFor(entry, tool);
  if (!state) {
    return dim('-'.padEnd(STATE_WIDTH));
  }
  return syncState(state) + ' '.repeat(Math.max(0, STATE_WIDTH - state.length));
}

/**
 * Lines printed for one skill entry
 */
export function formatEntry(entry: SkillEntry, localTools: Tool[], paths: PathProvider): string[] {
  const lines = [skillName(entry.name)];
  lines.push(`  source: ${entry.source ? displayPath(entry.source.sourceRoot, paths) : '-'}`);
  lines.push(
    '  ' +
      TOOLS.map((tool) => `${tool}: ${formatStatus(entry, tool)}`)
        .join(' ')
        .trimEnd()
  );
  if (localTools.length > 0) {
    lines.push(`  local:  ${toolTags(localTools)}`);
  }
  return lines;
}

/**
 * List skills and their sync status
 */
export async function listSkills(deps: CommandDeps = {}): Promise<void> {
  await withCatalog(deps, async ({ catalog, diagnostics, paths }) => {
    const entries = classifySkills(catalog, diagnostics);
    if (entries.length === 0) {
      console.log(dim('No skills found.'));
      return;
    }

    for (const entry of entries) {
      for (const line of formatEntry(entry, localSkillTools(catalog, entry.name), paths)) {
        console.log(line);
      }
      console.log('');
    }
  });
}

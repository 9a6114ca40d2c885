import type { Tool } from '../types.js';
import { skillNotFound } from '../utils/errors.js';
import { label } from '../utils/palette.js';
import { renderSkillOrThrow } from '../utils/render.js';
import { toolDisplayName, toolsFor } from '../utils/tools.js';
import { withCatalog } from './shared.js';
import type { CommandDeps } from './shared.js';

/**
 * Print a source skill as it would be installed for one or all tools
 */
export async function renderCommand(
  name: string,
  options: { tool: Tool | 'all' },
  deps: CommandDeps = {}
): Promise<void> {
  await withCatalog(deps, async ({ catalog }) => {
    const source = catalog.sources.get(name);
    if (!source) throw skillNotFound(name);

    const tools = toolsFor(options.tool);
    const multi = tools.length > 1;
    for (const tool of tools) {
      const rendered = renderSkillOrThrow(source.contents, tool, source.skillPath);
      if (multi) console.log(label(`=== ${toolDisplayName(tool)} ===`));
      process.stdout.write(rendered.endsWith('\n') ? rendered : `${rendered}\n`);
      if (multi) console.log('');
    }
  });
}

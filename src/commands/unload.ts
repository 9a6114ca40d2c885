import type { InstalledSkill, UnloadOptions } from '../types.js';
import { removeInstalledSkill } from '../utils/apply.js';
import { promptCanceled, skillNotFound } from '../utils/errors.js';
import { dim, skillName, success, toolTag } from '../utils/palette.js';
import { displayPath } from '../utils/paths.js';
import { toolDisplayName, toolsFor } from '../utils/tools.js';
import { withCatalog } from './shared.js';
import type { CommandDeps } from './shared.js';

/**
 * Remove a skill's global installs; source skills are left alone
 */
export async function unloadSkill(name: string, options: UnloadOptions, deps: CommandDeps = {}): Promise<string[]> {
  return withCatalog(deps, async ({ catalog, confirm, paths }) => {
    const installs = toolsFor(options.tool)
      .map((tool) => catalog.installs[tool].get(name))
      .filter((skill): skill is InstalledSkill => skill !== undefined);
    if (installs.length === 0) throw skillNotFound(name);

    const removed: string[] = [];
    for (const installed of installs) {
      const location = displayPath(installed.skillDir, paths);
      if (options.dryRun) {
        console.log(`Would remove ${skillName(name)} ${toolTag(installed.tool)} ${dim(location)}`);
        continue;
      }

      if (!options.force) {
        const decision = await confirm(`Remove '${name}' from ${toolDisplayName(installed.tool)} (${location})?`);
        if (decision === 'cancel') throw promptCanceled();
        if (decision === 'decline') {
          console.log(dim(`Skipped ${name} [${installed.tool}]`));
          continue;
        }
      }

      removeInstalledSkill(installed.skillDir);
      removed.push(installed.skillDir);
      console.log(success('✓ Removed') + ` ${skillName(name)} ${toolTag(installed.tool)}`);
    }
    return removed;
  });
}

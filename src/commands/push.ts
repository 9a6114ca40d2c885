import type { PushItem, PushOptions } from '../types.js';
import { writeInstalledSkill } from '../utils/apply.js';
import { unifiedDiff } from '../utils/diff.js';
import { SkillsError, promptCanceled } from '../utils/errors.js';
import { colorizeDiff, dim, skillName, success, toolTag, warning } from '../utils/palette.js';
import { displayPath } from '../utils/paths.js';
import type { PathProvider } from '../utils/paths.js';
import { needsWrite, planPush } from '../utils/push-plan.js';
import { globalSkillsDir, toolsFor } from '../utils/tools.js';
import { withCatalog } from './shared.js';
import type { CommandContext, CommandDeps } from './shared.js';

export interface PushSummary {
  written: number;
  skipped: number;
  unchanged: number;
}

function itemDiff(item: PushItem, paths: PathProvider): string {
  if (!item.installed) return '';
  return unifiedDiff(
    `tool: ${displayPath(item.installed.skillPath, paths)}`,
    `source: ${displayPath(item.skill.skillPath, paths)}`,
    item.installed.contents,
    item.rendered
  );
}

/**
 * Whether a modified install may be overwritten
 */
async function approveOverwrite(item: PushItem, options: PushOptions, ctx: CommandContext): Promise<boolean> {
  if (!options.force) {
    console.log(
      warning(`! ${item.skill.name} ${toolTag(item.tool)} modified in tool; use --force to overwrite`)
    );
    return false;
  }
  if (options.yes || options.dryRun) return true;

  const diff = itemDiff(item, ctx.paths);
  if (diff) console.log(colorizeDiff(diff.replace(/\n$/, '')));

  const decision = await ctx.confirm(`Overwrite ${item.tool} copy of '${item.skill.name}'?`);
  if (decision === 'cancel') throw promptCanceled();
  if (decision === 'decline') {
    console.log(dim(`  skipped ${item.skill.name} ${toolTag(item.tool)}`));
    return false;
  }
  return true;
}

/**
 * Render source skills and install them into tool directories
 */
export async function pushSkills(
  names: string[],
  options: PushOptions,
  deps: CommandDeps = {}
): Promise<PushSummary> {
  if (options.yes && !options.force) {
    throw new SkillsError('invalid', '--yes requires --force');
  }
  return withCatalog(deps, async (ctx) => {
    const items = planPush(ctx.catalog, { names, tools: toolsFor(options.tool) }, ctx.diagnostics);
    const summary: PushSummary = { written: 0, skipped: 0, unchanged: 0 };

    for (const item of items) {
      const tag = `${skillName(item.skill.name)} ${toolTag(item.tool)}`;

      if (!needsWrite(item)) {
        summary.unchanged++;
        if (options.all) console.log(dim(`= ${item.skill.name} [${item.tool}] unchanged`));
        continue;
      }

      if (item.status === 'modified' && !(await approveOverwrite(item, options, ctx))) {
        summary.skipped++;
        continue;
      }

      const verb = item.status === 'new' ? 'install' : 'update';
      if (options.dryRun) {
        console.log(`Would ${verb} ${tag}`);
      } else {
        const root = globalSkillsDir(item.tool, ctx.paths);
        writeInstalledSkill(root, item.skill.name, item.rendered, item.installed);
        console.log(success(`✓ ${item.status === 'new' ? 'Installed' : 'Updated'}`) + ` ${tag}`);
      }
      summary.written++;
    }

    if (options.dryRun) {
      console.log(dim(`\nDry run: ${summary.written} skill file(s) would be written.`));
    } else if (summary.written === 0 && summary.skipped === 0) {
      console.log(dim('Everything up to date.'));
    } else {
      console.log(
        `\nPushed ${summary.written}, skipped ${summary.skipped}, unchanged ${summary.unchanged}.`
      );
    }
    return summary;
  });
}

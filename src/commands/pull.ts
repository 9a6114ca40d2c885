import { existsSync, statSync } from 'fs';
import type { PullOptions, PullPlan, PullVariant } from '../types.js';
import { skillDirIn, writeSourceSkill } from '../utils/apply.js';
import { unifiedDiff } from '../utils/diff.js';
import { SkillsError } from '../utils/errors.js';
import { colorizeDiff, dim, error, skillName, success } from '../utils/palette.js';
import { displayPath, expandPath } from '../utils/paths.js';
import type { PathProvider } from '../utils/paths.js';
import { chooseSourceRoot, createPromptChooser, describeVariant } from '../utils/prompts.js';
import { formatAge, planPull, pullTarget, resolveVariant } from '../utils/pull-plan.js';
import type { VariantChooser } from '../utils/pull-plan.js';
import { pullRejection } from '../utils/sync-plan.js';
import { withCatalog } from './shared.js';
import type { CommandDeps } from './shared.js';

export interface PullDeps extends CommandDeps {
  chooser?: VariantChooser;
  chooseSource?: (sources: string[]) => Promise<string>;
}

export interface PullSummary {
  pulled: string[];
  skipped: string[];
  rejected: string[];
}

function printVariantDiff(left: PullVariant, right: PullVariant, paths: PathProvider): void {
  const diff = unifiedDiff(
    `${describeVariant(left)}: ${displayPath(left.skill.skillPath, paths)}`,
    `${describeVariant(right)}: ${displayPath(right.skill.skillPath, paths)}`,
    left.skill.contents,
    right.skill.contents
  );
  console.log(diff ? colorizeDiff(diff.replace(/\n$/, '')) : dim('(no differences)'));
  console.log('');
}

function resolveTargetRoot(to: string, paths: PathProvider): string {
  const root = expandPath(to, paths.cwd(), paths);
  if (!existsSync(root) || !statSync(root).isDirectory()) {
    throw new SkillsError('not-found', `Target directory does not exist: ${root}`, { path: root });
  }
  return root;
}

function printPlans(plans: PullPlan[]): void {
  console.log(`Found ${plans.length} skill(s) with changes to pull:\n`);
  for (const plan of plans) {
    const kind = plan.source ? 'modified' : 'new';
    console.log(`  ${skillName(plan.name)} ${dim(`(${kind})`)}`);
    for (const variant of plan.variants) {
      console.log(dim(`    ${describeVariant(variant)}, modified ${formatAge(variant.skill.modified)}`));
    }
  }
  console.log('');
}

/**
 * Copy tool-side edits back into source directories
 */
export async function pullSkills(
  name: string | undefined,
  options: PullOptions,
  deps: PullDeps = {}
): Promise<PullSummary> {
  return withCatalog(deps, async ({ catalog, diagnostics, paths, sources }) => {
    const override = options.to ? resolveTargetRoot(options.to, paths) : undefined;
    const plans = planPull(catalog, name, diagnostics);
    const summary: PullSummary = { pulled: [], skipped: [], rejected: [] };

    if (plans.length === 0) {
      console.log(dim('No modified skills found.'));
      return summary;
    }
    printPlans(plans);

    const chooser = deps.chooser ?? createPromptChooser((left, right) => printVariantDiff(left, right, paths));
    const chooseSource = deps.chooseSource ?? chooseSourceRoot;

    for (const plan of plans) {
      const variant = await resolveVariant(plan, chooser);
      if (!variant) {
        console.log(dim(`Skipped ${plan.name}`));
        summary.skipped.push(plan.name);
        continue;
      }

      const rejection = pullRejection(plan.name, variant.skill.contents);
      if (rejection) {
        console.error(error(`✗ Refusing to pull '${plan.name}' from ${describeVariant(variant)}: ${rejection}`));
        summary.rejected.push(plan.name);
        continue;
      }

      const target = pullTarget(plan, sources, override) ?? skillDirIn(await chooseSource(sources), plan.name);
      const written = writeSourceSkill(target, variant.skill.contents);
      console.log(
        success('✓ Pulled') +
          ` ${skillName(plan.name)} from ${describeVariant(variant)} ${dim(`-> ${displayPath(written, paths)}`)}`
      );
      summary.pulled.push(plan.name);
    }

    if (summary.rejected.length > 0) {
      throw new SkillsError('invalid', `${summary.rejected.length} skill(s) could not be pulled.`);
    }
    return summary;
  });
}

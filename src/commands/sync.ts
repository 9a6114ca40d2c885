import ora from 'ora';
import type { ConflictStrategy, SyncAction, SyncOptions, SyncPlan } from '../types.js';
import { applySyncPlan } from '../utils/apply.js';
import { SkillsError, errorMessage, skillNotFound } from '../utils/errors.js';
import { dim, error, skillName, toolTags } from '../utils/palette.js';
import { resolveConflicts, planSync } from '../utils/sync-plan.js';
import { withCatalog } from './shared.js';
import type { CommandDeps } from './shared.js';

export interface SyncSummary {
  pushed: number;
  pulled: number;
  conflicts: number;
}

export function conflictStrategy(options: SyncOptions): ConflictStrategy {
  if (options.preferSource && options.preferTool) {
    throw new SkillsError('invalid', 'Use either --prefer-source or --prefer-tool, not both.');
  }
  if (options.preferSource) return 'prefer-source';
  if (options.preferTool) return 'prefer-tool';
  return 'error';
}

/**
 * One-line description of a sync action, e.g. "[codex] -> source -> [claude]"
 */
export function describeAction(action: SyncAction): string {
  switch (action.kind) {
    case 'push':
      return `source -> ${toolTags(action.toTools)}`;
    case 'pull':
      return `${toolTags([action.fromTool])} -> source`;
    case 'pull-and-push':
      return `${toolTags([action.fromTool])} -> source -> ${toolTags(action.toTools)}`;
  }
}

function countAction(action: SyncAction, summary: SyncSummary): void {
  if (action.kind !== 'pull') summary.pushed += action.toTools.length;
  if (action.kind !== 'push') summary.pulled += 1;
}

function applyWithSpinner(plan: SyncPlan, run: () => void): void {
  const text = `${skillName(plan.name)}  ${describeAction(plan.action)}`;
  const spinner = ora(`Syncing ${plan.name}...`).start();
  try {
    run();
    spinner.succeed(text);
  } catch (err) {
    spinner.fail(`${text}: ${errorMessage(err)}`);
    throw err;
  }
}

/**
 * Reconcile source skills with tool installs in whichever direction is newer
 */
export async function syncSkills(
  names: string[],
  options: SyncOptions,
  deps: CommandDeps = {}
): Promise<SyncSummary> {
  const strategy = conflictStrategy(options);

  return withCatalog(deps, async ({ catalog, diagnostics, paths }) => {
    for (const name of names) {
      if (!catalog.sources.has(name)) throw skillNotFound(name);
    }

    const planned = planSync(catalog, diagnostics).filter(
      (plan) => names.length === 0 || names.includes(plan.name)
    );
    const summary: SyncSummary = { pushed: 0, pulled: 0, conflicts: 0 };

    if (planned.length === 0) {
      console.log(dim('All skills are in sync.'));
      return summary;
    }

    const { plans, conflicts } = resolveConflicts(planned, strategy);
    summary.conflicts = conflicts.length;

    for (const plan of plans) {
      if (options.dryRun) {
        console.log(`${skillName(plan.name)}  ${describeAction(plan.action)}`);
      } else {
        applyWithSpinner(plan, () => {
          applySyncPlan(plan, paths);
        });
      }
      countAction(plan.action, summary);
    }

    if (plans.length > 0) {
      console.log(
        options.dryRun
          ? dim(`\nDry run: ${summary.pushed} push, ${summary.pulled} pull operations would be performed.`)
          : `\nSynced: ${summary.pushed} pushed, ${summary.pulled} pulled.`
      );
    }

    if (conflicts.length > 0) {
      console.error('');
      for (const conflict of conflicts) {
        console.error(error(conflict.message));
      }
      throw new SkillsError('conflict', `${conflicts.length} skill(s) could not be synced.`);
    }
    return summary;
  });
}

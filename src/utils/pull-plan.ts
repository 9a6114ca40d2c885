import { TOOLS } from '../types.js';
import type { Catalog, Decision, InstalledSkill, PullPlan, PullVariant, VariantChoice } from '../types.js';
import { skillDirIn } from './apply.js';
import { catalogNames, sortByName } from './catalog.js';
import type { Diagnostics } from './diagnostics.js';
import { promptCanceled, skillNotFound } from './errors.js';
import { renderSkill } from './render.js';
import { contentsMatch } from './status.js';

/**
 * Interactive side of pull resolution, supplied by the command layer
 */
export interface VariantChooser {
  confirm(plan: PullPlan, variant: PullVariant): Promise<Decision>;
  choose(plan: PullPlan): Promise<VariantChoice>;
  showDiff(left: PullVariant, right: PullVariant): Promise<void>;
}

function copiesOf(catalog: Catalog, name: string): InstalledSkill[] {
  return TOOLS.flatMap((tool) => {
    const global = catalog.installs[tool].get(name);
    const local = catalog.locals[tool].get(name);
    return [global, local].filter((skill): skill is InstalledSkill => skill !== undefined);
  });
}

/**
 * Collect pullable variants per skill across global and project copies.
 *
 * With a source, only copies that differ from its rendering count; without
 * one, every copy is an orphan that would create a new source skill.
 */
export function planPull(catalog: Catalog, name: string | undefined, diagnostics: Diagnostics): PullPlan[] {
  let names = catalogNames(catalog, { includeLocals: true });
  if (name !== undefined) {
    if (!names.includes(name)) throw skillNotFound(name);
    names = [name];
  }

  const plans: PullPlan[] = [];
  for (const skillName of names) {
    const source = catalog.sources.get(skillName);
    const variants: PullVariant[] = [];
    let failed = false;

    for (const copy of copiesOf(catalog, skillName)) {
      if (!source) {
        variants.push({ skill: copy, orphan: true });
        continue;
      }
      const rendered = renderSkill(source.contents, copy.tool);
      if (!rendered.ok) {
        diagnostics.skip(source.skillPath, rendered.error);
        failed = true;
        break;
      }
      if (!contentsMatch(rendered.output, copy.contents)) {
        variants.push({ skill: copy, orphan: false });
      }
    }

    if (failed || variants.length === 0) continue;
    plans.push(source ? { name: skillName, source, variants } : { name: skillName, variants });
  }

  return sortByName(plans);
}

/**
 * Settle which variant to pull. Returns null when the user skips or declines.
 *
 * Several variants are never settled automatically; the chooser is asked
 * until it selects one, skips, or cancels.
 */
export async function resolveVariant(plan: PullPlan, chooser: VariantChooser): Promise<PullVariant | null> {
  const [only, ...others] = plan.variants;
  if (!only) return null;

  if (others.length === 0) {
    const decision = await chooser.confirm(plan, only);
    if (decision === 'cancel') throw promptCanceled();
    return decision === 'confirm' ? only : null;
  }

  for (;;) {
    const choice = await chooser.choose(plan);
    switch (choice.kind) {
      case 'cancel':
        throw promptCanceled();
      case 'skip':
        return null;
      case 'diff': {
        const left = plan.variants[choice.left];
        const right = plan.variants[choice.right];
        if (left && right && choice.left !== choice.right) {
          await chooser.showDiff(left, right);
        }
        break;
      }
      case 'select': {
        const selected = plan.variants[choice.index];
        if (selected) return selected;
        break;
      }
    }
  }
}

/**
 * Source skill directory a pull writes to; null when the user must pick a source root
 */
export function pullTarget(plan: PullPlan, sources: string[], override?: string): string | null {
  if (plan.source) return plan.source.skillDir;
  if (override) return skillDirIn(override, plan.name);
  if (sources.length === 1) return skillDirIn(sources[0], plan.name);
  return null;
}

function plural(count: number): string {
  return count === 1 ? '' : 's';
}

/**
 * Relative age such as "3 hours ago"
 */
export function formatAge(modified: number, now: number = Date.now()): string {
  const seconds = Math.max(0, Math.floor((now - modified) / 1000));
  if (seconds < 60) return 'moments ago';
  if (seconds < 60 * 60) {
    const minutes = Math.floor(seconds / 60);
    return `${minutes} minute${plural(minutes)} ago`;
  }
  if (seconds < 60 * 60 * 24) {
    const hours = Math.floor(seconds / 3600);
    return `${hours} hour${plural(hours)} ago`;
  }
  const days = Math.floor(seconds / 86400);
  return `${days} day${plural(days)} ago`;
}

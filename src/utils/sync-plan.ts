import { TOOLS } from '../types.js';
import type {
  Catalog,
  ConflictStrategy,
  InstalledSkill,
  SourceSkill,
  SyncAction,
  SyncConflict,
  SyncPlan,
  Tool,
} from '../types.js';
import { sortByName } from './catalog.js';
import type { Diagnostics } from './diagnostics.js';
import { errorMessage } from './errors.js';
import { parseFrontmatter } from './frontmatter.js';
import { renderSkill } from './render.js';
import { contentsMatch } from './status.js';

/**
 * Installed copy with the greatest mtime; ties keep the earlier tool
 */
export function newestCopy(copies: InstalledSkill[]): InstalledSkill | undefined {
  let newest: InstalledSkill | undefined;
  for (const copy of copies) {
    if (!newest || copy.modified > newest.modified) {
      newest = copy;
    }
  }
  return newest;
}

function pullFrom(fromTool: Tool, differing: InstalledSkill[]): SyncAction {
  const toTools = differing.map((copy) => copy.tool).filter((tool) => tool !== fromTool);
  return toTools.length > 0 ? { kind: 'pull-and-push', fromTool, toTools } : { kind: 'pull', fromTool };
}

function pushTo(differing: InstalledSkill[]): SyncAction {
  return { kind: 'push', toTools: differing.map((copy) => copy.tool) };
}

/**
 * Pick the direction from timestamps: the source wins ties
 */
export function determineAction(source: SourceSkill, differing: InstalledSkill[]): SyncAction {
  const newest = newestCopy(differing);
  if (!newest || source.modified >= newest.modified) {
    return pushTo(differing);
  }
  return pullFrom(newest.tool, differing);
}

/**
 * Global installs of a source skill whose content differs from its rendering
 */
export function differingCopies(
  catalog: Catalog,
  source: SourceSkill,
  diagnostics: Diagnostics
): InstalledSkill[] {
  const differing: InstalledSkill[] = [];
  for (const tool of TOOLS) {
    const installed = catalog.installs[tool].get(source.name);
    if (!installed) continue;

    const rendered = renderSkill(source.contents, tool);
    if (!rendered.ok) {
      diagnostics.skip(source.skillPath, rendered.error);
      continue;
    }
    if (!contentsMatch(rendered.output, installed.contents)) {
      differing.push(installed);
    }
  }
  return differing;
}

/**
 * One plan per source skill with at least one out-of-sync tool copy
 */
export function planSync(catalog: Catalog, diagnostics: Diagnostics): SyncPlan[] {
  const plans: SyncPlan[] = [];
  for (const source of catalog.sources.values()) {
    const differing = differingCopies(catalog, source, diagnostics);
    if (differing.length === 0) continue;
    plans.push({
      name: source.name,
      source,
      differing,
      action: determineAction(source, differing),
    });
  }
  return sortByName(plans);
}

/**
 * True when the differing tool copies disagree with each other
 */
export function detectDivergence(plan: SyncPlan): boolean {
  const [first, ...rest] = plan.differing;
  if (!first) return false;
  return rest.some((copy) => !contentsMatch(first.contents, copy.contents));
}

function formatTools(tools: Tool[]): string {
  return tools.map((tool) => `[${tool}]`).join(' and ');
}

/**
 * Reason a pulled copy may not become the new source, or null when it may
 */
export function pullRejection(name: string, contents: string): string | null {
  try {
    const metadata = parseFrontmatter(contents);
    if (metadata.name !== name) {
      return `frontmatter name '${metadata.name}' does not match skill '${name}'`;
    }
    return null;
  } catch (error) {
    return errorMessage(error);
  }
}

function pulledTool(action: SyncAction): Tool | undefined {
  return action.kind === 'push' ? undefined : action.fromTool;
}

export interface ResolvedPlans {
  plans: SyncPlan[];
  conflicts: SyncConflict[];
}

/**
 * Apply the conflict strategy to divergent plans and vet every pull.
 *
 * Plans that cannot proceed are moved to `conflicts`; the rest are kept.
 */
export function resolveConflicts(plans: SyncPlan[], strategy: ConflictStrategy): ResolvedPlans {
  const resolved: SyncPlan[] = [];
  const conflicts: SyncConflict[] = [];

  for (const plan of plans) {
    let action = plan.action;

    if (plan.differing.length > 1 && detectDivergence(plan)) {
      const tools = plan.differing.map((copy) => copy.tool);
      if (strategy === 'error') {
        conflicts.push({
          name: plan.name,
          tools,
          reason: 'divergent',
          message: `Conflict: skill '${plan.name}' has divergent modifications in ${formatTools(tools)}. Resolve manually.`,
        });
        continue;
      }
      if (strategy === 'prefer-source') {
        action = pushTo(plan.differing);
      } else {
        const newest = newestCopy(plan.differing);
        if (newest) action = pullFrom(newest.tool, plan.differing);
      }
    }

    const fromTool = pulledTool(action);
    const pulled = fromTool ? plan.differing.find((copy) => copy.tool === fromTool) : undefined;
    if (fromTool && pulled) {
      const rejection = pullRejection(plan.name, pulled.contents);
      if (rejection) {
        conflicts.push({
          name: plan.name,
          tools: [fromTool],
          reason: 'invalid',
          message: `Refusing to pull '${plan.name}' from [${fromTool}]: ${rejection}`,
        });
        continue;
      }
    }

    resolved.push({ ...plan, action });
  }

  return { plans: resolved, conflicts };
}

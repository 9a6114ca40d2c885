import type { Catalog, Decision } from '../types.js';
import { loadCatalog } from '../utils/catalog.js';
import { loadSources } from '../utils/config.js';
import { Diagnostics } from '../utils/diagnostics.js';
import { systemPaths } from '../utils/paths.js';
import type { PathProvider } from '../utils/paths.js';
import { confirmDecision } from '../utils/prompts.js';

/**
 * Collaborators a command reaches for; tests replace them
 */
export interface CommandDeps {
  paths?: PathProvider;
  env?: NodeJS.ProcessEnv;
  diagnostics?: Diagnostics;
  confirm?: (message: string) => Promise<Decision>;
}

export interface CommandContext {
  paths: PathProvider;
  sources: string[];
  diagnostics: Diagnostics;
  catalog: Catalog;
  confirm: (message: string) => Promise<Decision>;
}

export function withPaths(deps: CommandDeps): PathProvider {
  return deps.paths ?? systemPaths;
}

/**
 * Load config and catalog, run the command, then print the diagnostics summary
 */
export async function withCatalog<T>(deps: CommandDeps, run: (ctx: CommandContext) => Promise<T>): Promise<T> {
  const paths = withPaths(deps);
  const sources = loadSources(paths, deps.env ?? process.env);
  const diagnostics = deps.diagnostics ?? new Diagnostics();
  const catalog = loadCatalog({ sources, paths, diagnostics });

  try {
    return await run({
      paths,
      sources,
      diagnostics,
      catalog,
      confirm: deps.confirm ?? confirmDecision,
    });
  } finally {
    diagnostics.printSummary();
  }
}

import { existsSync } from 'fs';
import { addSource, getConfigPath, listSources, removeSource } from '../utils/config.js';
import { SkillsError, promptCanceled } from '../utils/errors.js';
import { accent, dim, label, success, warning } from '../utils/palette.js';
import { displayPath } from '../utils/paths.js';
import { confirmDecision } from '../utils/prompts.js';
import { withPaths } from './shared.js';
import type { CommandDeps } from './shared.js';

/**
 * Add a source directory to the configuration
 */
export async function addSourceCommand(dir: string, deps: CommandDeps = {}): Promise<void> {
  const paths = withPaths(deps);
  const added = addSource(dir, paths, deps.env ?? process.env);
  console.log(success(`✓ Added source: ${label(displayPath(added, paths))}`));
  if (!existsSync(added)) {
    console.log(warning(`  Directory does not exist yet: ${added}`));
  }
}

/**
 * Remove a source directory from the configuration
 */
export async function removeSourceCommand(
  dir: string,
  options: { yes?: boolean },
  deps: CommandDeps = {}
): Promise<void> {
  const paths = withPaths(deps);
  const env = deps.env ?? process.env;

  if (!options.yes) {
    const decision = await (deps.confirm ?? confirmDecision)(`Remove source '${dir}'?`);
    if (decision === 'cancel') throw promptCanceled();
    if (decision === 'decline') {
      console.log(warning('Cancelled'));
      return;
    }
  }

  if (!removeSource(dir, paths, env)) {
    throw new SkillsError('not-found', `Source '${dir}' is not configured`);
  }
  console.log(success(`✓ Removed source: ${label(dir)}`));
}

/**
 * List configured source directories
 */
export async function listSourcesCommand(deps: CommandDeps = {}): Promise<void> {
  const paths = withPaths(deps);
  const env = deps.env ?? process.env;
  const sources = listSources(paths, env);

  if (sources.length === 0) {
    console.log(dim('No sources configured.'));
    console.log(dim('\nAdd a source:'));
    console.log(accent('  skillsync source add <dir>'));
    return;
  }

  console.log(label('Configured sources:\n'));
  for (const source of sources) {
    const missing = existsSync(source) ? '' : warning(' (missing)');
    console.log(`  ${displayPath(source, paths)}${missing}`);
  }
  console.log(dim(`\nConfig: ${displayPath(getConfigPath(paths, env), paths)}`));
}

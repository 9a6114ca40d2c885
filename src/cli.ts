#!/usr/bin/env node
import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import chalk from 'chalk';
import { Command, Option } from 'commander';
import { TOOLS } from './types.js';
import { diffSkills } from './commands/diff.js';
import { listSkills } from './commands/list.js';
import { moveSkill } from './commands/mv.js';
import { newSkill } from './commands/new.js';
import { promoteSkill } from './commands/promote.js';
import { pullSkills } from './commands/pull.js';
import { pushSkills } from './commands/push.js';
import { renderCommand } from './commands/render.js';
import { showSkill } from './commands/show.js';
import { addSourceCommand, listSourcesCommand, removeSourceCommand } from './commands/source.js';
import { syncSkills } from './commands/sync.js';
import { unloadSkill } from './commands/unload.js';
import { validateSkills } from './commands/validate.js';
import { SkillsError, errorMessage } from './utils/errors.js';
import { error, warning } from './utils/palette.js';
import { parseToolFilter } from './utils/tools.js';

function readPackageVersion(): string {
  // nearest package.json above src/ or dist/src/
  let current = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const packageJsonPath = join(current, 'package.json');
    if (existsSync(packageJsonPath)) {
      const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
      if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
    }
    const parent = dirname(current);
    if (parent === current) return '0.0.0';
    current = parent;
  }
}

/**
 * Run a command action, reporting failures and setting the exit code
 */
async function run(action: () => Promise<unknown>): Promise<void> {
  try {
    await action();
  } catch (err) {
    if (err instanceof SkillsError && err.code === 'canceled') {
      console.error(warning('\nCancelled by user'));
    } else {
      console.error(error(`Error: ${errorMessage(err)}`));
    }
    process.exitCode = 1;
  }
}

function toolOption(): Option {
  return new Option('-t, --tool <tool>', 'Target tool').choices([...TOOLS, 'all']).default('all');
}

const program = new Command();

program
  .name('skillsync')
  .description('Keep agent skills in sync across Claude Code, Codex and Gemini')
  .version(readPackageVersion())
  .option('--no-color', 'Disable colored output')
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts().color === false) {
      chalk.level = 0;
    }
  });

program
  .command('list', { isDefault: true })
  .aliases(['ls', 'status'])
  .description('List skills and their sync status per tool')
  .action(() => run(() => listSkills()));

program
  .command('push')
  .description('Render source skills and install them into tool directories')
  .argument('[names...]', 'Skill names (default: all source skills)')
  .option('-a, --all', 'Also report skills that are already up to date')
  .addOption(toolOption())
  .option('-n, --dry-run', 'Show what would be written without writing')
  .option('-f, --force', 'Overwrite copies modified in the tool')
  .option('-y, --yes', 'Skip overwrite confirmation (requires --force)')
  .action((names: string[], options: { all?: boolean; tool: string; dryRun?: boolean; force?: boolean; yes?: boolean }) =>
    run(() => pushSkills(names, { ...options, tool: parseToolFilter(options.tool) }))
  );

program
  .command('pull')
  .description('Copy edits made in tool directories back into sources')
  .argument('[name]', 'Skill name (default: every modified skill)')
  .option('--to <dir>', 'Source directory for skills that do not exist yet')
  .action((name: string | undefined, options: { to?: string }) => run(() => pullSkills(name, options)));

program
  .command('diff')
  .description('Show differences between sources and installed copies')
  .argument('[name]', 'Skill name')
  .action((name: string | undefined) => run(() => diffSkills(name)));

program
  .command('sync')
  .description('Push or pull each skill depending on which side changed last')
  .argument('[names...]', 'Skill names (default: all source skills)')
  .option('--prefer-source', 'Resolve divergent tool copies by pushing the source')
  .option('--prefer-tool', 'Resolve divergent tool copies by pulling the newest copy')
  .option('-n, --dry-run', 'Show the plan without writing')
  .action((names: string[], options: { preferSource?: boolean; preferTool?: boolean; dryRun?: boolean }) =>
    run(() => syncSkills(names, options))
  );

program
  .command('validate')
  .description('Check frontmatter and templates of source skills')
  .argument('[name]', 'Skill name')
  .action((name: string | undefined) => run(() => validateSkills(name)));

program
  .command('render')
  .description('Print a source skill as rendered for a tool')
  .argument('<name>', 'Skill name')
  .addOption(toolOption())
  .action((name: string, options: { tool: string }) =>
    run(() => renderCommand(name, { tool: parseToolFilter(options.tool) }))
  );

program
  .command('new')
  .description('Create a new skill directory with a SKILL.md template')
  .argument('<path>', 'Directory to create')
  .action((path: string) => run(() => newSkill(path)));

program
  .command('unload')
  .description('Remove a skill from tool directories')
  .argument('<name>', 'Skill name')
  .addOption(toolOption())
  .option('-n, --dry-run', 'Show what would be removed')
  .option('-f, --force', 'Remove without confirmation')
  .action((name: string, options: { tool: string; dryRun?: boolean; force?: boolean }) =>
    run(() => unloadSkill(name, { ...options, tool: parseToolFilter(options.tool) }))
  );

program
  .command('show')
  .description('Print a skill from its source, a tool install or a project copy')
  .argument('<name>', 'Skill name')
  .action((name: string) => run(() => showSkill(name)));

program
  .command('mv')
  .description('Rename a skill in its source and in every tool directory')
  .argument('<old-name>', 'Current skill name')
  .argument('<new-name>', 'New skill name')
  .option('-n, --dry-run', 'Show what would be renamed')
  .option('-f, --force', 'Replace an existing skill and skip confirmation')
  .action((oldName: string, newName: string, options: { dryRun?: boolean; force?: boolean }) =>
    run(() => moveSkill(oldName, newName, options))
  );

program
  .command('promote')
  .description("Move a project skill into the tool's user-wide skills directory")
  .argument('<name>', 'Skill name')
  .addOption(toolOption())
  .option('-n, --dry-run', 'Show what would be moved')
  .option('-f, --force', 'Replace an existing user-wide skill')
  .action((name: string, options: { tool: string; dryRun?: boolean; force?: boolean }) =>
    run(() => promoteSkill(name, { ...options, tool: parseToolFilter(options.tool) }))
  );

const source = program.command('source').description('Manage source directories');

source
  .command('add')
  .description('Add a source directory')
  .argument('<dir>', 'Directory containing skill folders')
  .action((dir: string) => run(() => addSourceCommand(dir)));

source
  .command('remove')
  .alias('rm')
  .description('Remove a source directory')
  .argument('<dir>', 'Configured directory')
  .option('-y, --yes', 'Skip confirmation')
  .action((dir: string, options: { yes?: boolean }) => run(() => removeSourceCommand(dir, options)));

source
  .command('list')
  .alias('ls')
  .description('List configured source directories')
  .action(() => run(() => listSourcesCommand()));

await program.parseAsync(process.argv);

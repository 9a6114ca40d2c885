import chalk from 'chalk';
import { TOOLS } from '../types.js';
import type { Catalog } from '../types.js';
import { skillNotFound } from '../utils/errors.js';
import { withCatalog } from './shared.js';
import type { CommandDeps } from './shared.js';

/**
 * Raw contents of a skill: the source if there is one, else the first
 * global install, else the first project copy
 */
export function findSkillContents(catalog: Catalog, name: string): string | undefined {
  const source = catalog.sources.get(name);
  if (source) return source.contents;

  for (const index of [catalog.installs, catalog.locals]) {
    for (const tool of TOOLS) {
      const skill = index[tool].get(name);
      if (skill) return skill.contents;
    }
  }
  return undefined;
}

function formatInline(text: string): string {
  return text
    .replace(/`[^`]+`/g, (code) => chalk.cyan(code))
    .replace(/\*\*([^*]+)\*\*/g, (_match, bold: string) => chalk.bold(bold))
    .replace(/\[([^\]]+)\]\(([^)]+)\)/g, (_match, text: string, url: string) =>
      chalk.blue.underline(text) + chalk.dim(` (${url})`)
    );
}

/**
 * Light terminal styling for Markdown: dim frontmatter, cyan code, bold headings
 */
export function highlightMarkdown(contents: string): string {
  let fences = 0;
  let inCode = false;

  return contents
    .split('\n')
    .map((line, index) => {
      if (line === '---' && fences < 2 && (index === 0 || fences === 1)) {
        fences++;
        return chalk.dim(line);
      }
      if (fences === 1) return chalk.dim(line);

      if (line.startsWith('```')) {
        inCode = !inCode;
        return chalk.cyan(line);
      }
      if (inCode) return chalk.cyan(line);

      if (line.startsWith('#')) return chalk.bold(line);
      if (line.startsWith('> ')) return chalk.yellow(line);

      const bullet = /^(\s*(?:[-*]|\d+\.) )(.*)$/.exec(line);
      if (bullet) return chalk.blue(bullet[1]) + formatInline(bullet[2]);
      return formatInline(line);
    })
    .join('\n');
}

/**
 * Print a skill's SKILL.md, looking in sources, then tool installs, then project copies
 */
export async function showSkill(name: string, deps: CommandDeps = {}): Promise<void> {
  await withCatalog(deps, async ({ catalog }) => {
    const contents = findSkillContents(catalog, name);
    if (contents === undefined) throw skillNotFound(name);

    const output = highlightMarkdown(contents);
    process.stdout.write(output.endsWith('\n') ? output : `${output}\n`);
  });
}

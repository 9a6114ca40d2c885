import chalk from 'chalk';
import type { SyncState, Tool } from '../types.js';

export const error = chalk.red;
export const warning = chalk.yellow;
export const success = chalk.green;
export const dim = chalk.dim;
export const accent = chalk.cyan;
export const label = chalk.bold;

export function skillName(name: string): string {
  return chalk.bold(name);
}

export function toolTag(tool: Tool): string {
  return chalk.magenta(`[${tool}]`);
}

export function toolTags(tools: Tool[]): string {
  return tools.map(toolTag).join(', ');
}

export function syncState(state: SyncState): string {
  switch (state) {
    case 'synced':
      return chalk.green(state);
    case 'modified':
      return chalk.yellow(state);
    case 'missing':
    case 'orphan':
      return chalk.red(state);
  }
}

/**
 * Colour a unified diff line by line
 */
export function colorizeDiff(diff: string): string {
  return diff
    .split('\n')
    .map((line) => {
      if (line.startsWith('+++') || line.startsWith('---')) return chalk.bold(line);
      if (line.startsWith('@@')) return chalk.cyan(line);
      if (line.startsWith('+')) return chalk.green(line);
      if (line.startsWith('-')) return chalk.red(line);
      return line;
    })
    .join('\n');
}

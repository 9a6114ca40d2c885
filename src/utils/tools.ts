import { join } from 'path';
import { TOOLS } from '../types.js';
import type { Tool, ToolTable } from '../types.js';
import { SkillsError } from './errors.js';
import type { PathProvider } from './paths.js';

const DISPLAY_NAMES: ToolTable<string> = {
  claude: 'Claude Code',
  codex: 'Codex',
  gemini: 'Gemini',
};

export function toolDisplayName(tool: Tool): string {
  return DISPLAY_NAMES[tool];
}

export function isTool(value: string): value is Tool {
  return TOOLS.some((tool) => tool === value);
}

/**
 * Parse a --tool option value; 'all' expands to every supported tool
 */
export function parseToolFilter(value: string): Tool | 'all' {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'all' || isTool(normalized)) {
    return normalized;
  }
  throw new SkillsError('invalid', `Unknown tool '${value}' (expected ${[...TOOLS, 'all'].join(', ')})`);
}

export function toolsFor(filter: Tool | 'all'): Tool[] {
  return filter === 'all' ? [...TOOLS] : [filter];
}

/**
 * Build a table with one fresh value per tool
 */
export function toolTable<T>(create: (tool: Tool) => T): ToolTable<T> {
  return {
    claude: create('claude'),
    codex: create('codex'),
    gemini: create('gemini'),
  };
}

function toolSkillsSegment(tool: Tool): string {
  return join(`.${tool}`, 'skills');
}

/**
 * User-wide skills directory, e.g. ~/.claude/skills
 */
export function globalSkillsDir(tool: Tool, paths: PathProvider): string {
  return join(paths.homeDir(), toolSkillsSegment(tool));
}

/**
 * Project skills directory under the working directory, e.g. ./.codex/skills
 */
export function localSkillsDir(tool: Tool, paths: PathProvider): string {
  return join(paths.cwd(), toolSkillsSegment(tool));
}

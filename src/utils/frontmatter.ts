import YAML from 'yaml';
import type { SkillMetadata } from '../types.js';

export class FrontmatterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrontmatterError';
  }
}

function trimLineEnding(line: string): string {
  return line.replace(/[\r\n]+$/, '');
}

/**
 * Return the YAML text between the leading `---` fences, or null
 */
export function extractFrontmatterBlock(contents: string): string | null {
  const lines = contents.split(/(?<=\n)/);
  if (lines.length === 0 || trimLineEnding(lines[0]) !== '---') {
    return null;
  }

  const block: string[] = [];
  for (const line of lines.slice(1)) {
    if (trimLineEnding(line) === '---') {
      return block.join('');
    }
    block.push(line);
  }
  return null;
}

function requiredField(record: Record<string, unknown>, field: keyof SkillMetadata): string {
  const raw = record[field];
  const value = typeof raw === 'string' ? raw.trim() : '';
  if (!value) {
    throw new FrontmatterError(`missing required field '${field}'`);
  }
  return value;
}

/**
 * Parse and validate the frontmatter of a SKILL.md file
 */
export function parseFrontmatter(contents: string): SkillMetadata {
  const block = extractFrontmatterBlock(contents);
  if (block === null) {
    throw new FrontmatterError('missing YAML frontmatter');
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(block);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new FrontmatterError(`invalid YAML frontmatter: ${message}`);
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new FrontmatterError('frontmatter is not a YAML mapping');
  }

  const record: Record<string, unknown> = Object.fromEntries(Object.entries(parsed));
  return {
    name: requiredField(record, 'name'),
    description: requiredField(record, 'description'),
  };
}

/**
 * Rewrite the top-level `name:` line of the frontmatter; other lines are kept byte for byte
 */
export function setFrontmatterName(contents: string, name: string): string {
  const lines = contents.split(/(?<=\n)/);
  if (lines.length === 0 || trimLineEnding(lines[0]) !== '---') {
    return contents;
  }

  for (let i = 1; i < lines.length; i++) {
    const line = trimLineEnding(lines[i]);
    if (line === '---') break;
    if (/^name\s*:/.test(line)) {
      lines[i] = `name: ${name}${lines[i].slice(line.length)}`;
      break;
    }
  }
  return lines.join('');
}

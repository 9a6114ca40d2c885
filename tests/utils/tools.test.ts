import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { displayPath, expandPath } from '../../src/utils/paths.js';
import type { PathProvider } from '../../src/utils/paths.js';
import { globalSkillsDir, localSkillsDir, parseToolFilter, toolDisplayName, toolsFor } from '../../src/utils/tools.js';

const paths: PathProvider = { homeDir: () => '/home/tester', cwd: () => '/work/project' };

describe('tools', () => {
  it('should parse tool filters case-insensitively', () => {
    expect(parseToolFilter('Codex')).toBe('codex');
    expect(parseToolFilter('all')).toBe('all');
    expect(() => parseToolFilter('vim')).toThrow("Unknown tool 'vim' (expected claude, codex, gemini, all)");
  });

  it('should expand filters to tool lists', () => {
    expect(toolsFor('all')).toEqual(['claude', 'codex', 'gemini']);
    expect(toolsFor('gemini')).toEqual(['gemini']);
  });

  it('should locate global and project skills directories', () => {
    expect(globalSkillsDir('claude', paths)).toBe(join('/home/tester', '.claude', 'skills'));
    expect(localSkillsDir('codex', paths)).toBe(join('/work/project', '.codex', 'skills'));
    expect(toolDisplayName('claude')).toBe('Claude Code');
  });
});

describe('paths', () => {
  it('should expand ~ and relative paths', () => {
    expect(expandPath('~', '/base', paths)).toBe('/home/tester');
    expect(expandPath('~/skills', '/base', paths)).toBe('/home/tester/skills');
    expect(expandPath('skills', '/base', paths)).toBe('/base/skills');
    expect(expandPath('/abs/../skills', '/base', paths)).toBe('/skills');
  });

  it('should abbreviate the home directory for display', () => {
    expect(displayPath('/home/tester/.claude/skills', paths)).toBe('~/.claude/skills');
    expect(displayPath('/home/tester', paths)).toBe('~');
    expect(displayPath('/home/testers', paths)).toBe('/home/testers');
  });
});

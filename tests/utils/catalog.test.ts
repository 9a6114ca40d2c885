import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { catalogNames, hasSkill, loadCatalog, sortByName } from '../../src/utils/catalog.js';
import {
  collectDiagnostics,
  createSandbox,
  globalDir,
  loadSandbox,
  localDir,
  skillContent,
  writeSkill,
} from '../helpers.js';
import type { Sandbox } from '../helpers.js';

describe('catalog', () => {
  let sandbox: Sandbox;

  beforeEach(() => {
    sandbox = createSandbox();
  });

  afterEach(() => {
    sandbox.cleanup();
  });

  it('should load source skills keyed by frontmatter name', () => {
    writeSkill(sandbox.source, 'beta', skillContent('beta'), 1_700_000_000);
    writeSkill(sandbox.source, 'alpha', skillContent('alpha'));

    const catalog = loadSandbox(sandbox);
    const beta = catalog.sources.get('beta');

    expect([...catalog.sources.keys()]).toEqual(['alpha', 'beta']);
    expect(beta?.description).toBe('beta skill');
    expect(beta?.sourceRoot).toBe(sandbox.source);
    expect(beta?.skillPath).toBe(join(sandbox.source, 'beta', 'SKILL.md'));
    expect(beta?.modified).toBe(1_700_000_000_000);
  });

  it('should skip skills with invalid frontmatter and keep going', () => {
    const broken = writeSkill(sandbox.source, 'broken', 'no frontmatter here\n');
    writeSkill(sandbox.source, 'alpha', skillContent('alpha'));
    const { diagnostics } = collectDiagnostics();

    const catalog = loadSandbox(sandbox, diagnostics);

    expect([...catalog.sources.keys()]).toEqual(['alpha']);
    expect(diagnostics.skipped).toEqual([{ path: broken, reason: 'missing YAML frontmatter' }]);
  });

  it('should ignore directories without SKILL.md and hidden entries', () => {
    mkdirSync(join(sandbox.source, 'empty'));
    writeSkill(sandbox.source, '.hidden', skillContent('hidden'));
    const { diagnostics } = collectDiagnostics();

    const catalog = loadSandbox(sandbox, diagnostics);

    expect(catalog.sources.size).toBe(0);
    expect(diagnostics.skipped).toEqual([]);
    expect(diagnostics.warningCount).toBe(0);
  });

  it('should warn about a missing source root', () => {
    const missing = join(sandbox.root, 'nowhere');
    const { diagnostics, lines } = collectDiagnostics();

    loadCatalog({ sources: [missing], paths: sandbox.paths, diagnostics });

    expect(lines).toEqual([`Warning: source directory not found: ${missing}`]);
  });

  it('should keep the first of two sources defining the same skill', () => {
    const second = join(sandbox.root, 'more-skills');
    writeSkill(sandbox.source, 'alpha', skillContent('alpha', 'first'));
    writeSkill(second, 'alpha', skillContent('alpha', 'second'));
    const { diagnostics, lines } = collectDiagnostics();

    const catalog = loadCatalog({ sources: [sandbox.source, second], paths: sandbox.paths, diagnostics });

    expect(catalog.sources.get('alpha')?.contents).toBe(skillContent('alpha', 'first'));
    expect(catalog.conflicts).toEqual([
      { name: 'alpha', paths: [join(sandbox.source, 'alpha'), join(second, 'alpha')] },
    ]);
    expect(lines).toEqual([
      `Warning: skill 'alpha' exists in multiple sources, using ${sandbox.source}`,
      `  - ${join(sandbox.source, 'alpha')}`,
      `  - ${join(second, 'alpha')}`,
    ]);
  });

  it('should load global and project installs per tool', () => {
    writeSkill(globalDir(sandbox, 'claude'), 'alpha', skillContent('alpha'));
    writeSkill(localDir(sandbox, 'codex'), 'beta', skillContent('beta'));

    const catalog = loadSandbox(sandbox);

    expect(catalog.installs.claude.get('alpha')?.origin).toBe('global');
    expect(catalog.installs.codex.size).toBe(0);
    expect(catalog.locals.codex.get('beta')).toMatchObject({ tool: 'codex', origin: 'local' });
    expect(catalog.installs.gemini.size).toBe(0);
  });

  it('should warn once per tool and keep loading when the home directory cannot be resolved', () => {
    writeSkill(sandbox.source, 'alpha', skillContent('alpha'));
    writeSkill(localDir(sandbox, 'gemini'), 'beta', skillContent('beta'));
    const { diagnostics, lines } = collectDiagnostics();
    const paths = {
      homeDir: (): string => {
        throw new Error('could not determine home directory');
      },
      cwd: () => sandbox.cwd,
    };

    const catalog = loadCatalog({ sources: [sandbox.source], paths, diagnostics });

    expect(lines).toEqual([
      'Warning: could not determine home directory',
      'Warning: could not determine home directory',
      'Warning: could not determine home directory',
    ]);
    expect(catalog.installs.claude.size + catalog.installs.codex.size + catalog.installs.gemini.size).toBe(0);
    expect([...catalog.sources.keys()]).toEqual(['alpha']);
    expect(catalog.locals.gemini.get('beta')?.origin).toBe('local');
  });

  it('should warn when a global skills directory cannot be read', () => {
    const root = globalDir(sandbox, 'codex');
    mkdirSync(join(sandbox.home, '.codex'), { recursive: true });
    writeFileSync(root, 'not a directory');
    writeSkill(globalDir(sandbox, 'claude'), 'alpha', skillContent('alpha'));
    const { diagnostics, lines } = collectDiagnostics();

    const catalog = loadSandbox(sandbox, diagnostics);

    expect(lines).toHaveLength(1);
    expect(lines[0].startsWith(`Warning: failed to read directory ${root}: ENOTDIR`)).toBe(true);
    expect(catalog.installs.codex.size).toBe(0);
    expect(catalog.installs.claude.has('alpha')).toBe(true);
  });

  it('should stay quiet about an unreadable project skills directory', () => {
    mkdirSync(join(sandbox.cwd, '.claude'), { recursive: true });
    writeFileSync(localDir(sandbox, 'claude'), 'not a directory');
    const { diagnostics, lines } = collectDiagnostics();

    const catalog = loadSandbox(sandbox, diagnostics);

    expect(lines).toEqual([]);
    expect(catalog.locals.claude.size).toBe(0);
  });

  describe('catalogNames', () => {
    it('should list sources first, then tool-only names', () => {
      writeSkill(sandbox.source, 'zeta', skillContent('zeta'));
      writeSkill(globalDir(sandbox, 'gemini'), 'alpha', skillContent('alpha'));
      writeSkill(globalDir(sandbox, 'claude'), 'zeta', skillContent('zeta'));
      writeSkill(localDir(sandbox, 'claude'), 'local-only', skillContent('local-only'));

      const catalog = loadSandbox(sandbox);

      expect(catalogNames(catalog)).toEqual(['zeta', 'alpha']);
      expect(catalogNames(catalog, { includeLocals: true })).toEqual(['zeta', 'alpha', 'local-only']);
      expect(hasSkill(catalog, 'local-only')).toBe(false);
      expect(hasSkill(catalog, 'local-only', { includeLocals: true })).toBe(true);
    });
  });

  it('sortByName should ignore case and keep ties in order', () => {
    const sorted = sortByName([
      { name: 'beta', id: 1 },
      { name: 'Alpha', id: 2 },
      { name: 'BETA', id: 3 },
    ]);
    expect(sorted.map((item) => item.id)).toEqual([2, 1, 3]);
  });
});

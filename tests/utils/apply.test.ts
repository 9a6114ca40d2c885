import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { applySyncPlan, moveSkillDir, removeInstalledSkill, skillDirIn, writeInstalledSkill } from '../../src/utils/apply.js';
import { SkillsError } from '../../src/utils/errors.js';
import { classifySkills } from '../../src/utils/status.js';
import { planSync } from '../../src/utils/sync-plan.js';
import { collectDiagnostics, createSandbox, globalDir, loadSandbox, skillContent, writeSkill } from '../helpers.js';
import type { Sandbox } from '../helpers.js';

function read(path: string): string {
  return readFileSync(path, 'utf-8');
}

describe('apply', () => {
  let sandbox: Sandbox;

  beforeEach(() => {
    sandbox = createSandbox();
  });

  afterEach(() => {
    sandbox.cleanup();
  });

  describe('skillDirIn', () => {
    it('should join the name onto the root', () => {
      expect(skillDirIn(sandbox.source, 'alpha')).toBe(join(sandbox.source, 'alpha'));
    });

    it('should refuse names that leave the root', () => {
      expect(() => skillDirIn(sandbox.source, '../escape')).toThrow(SkillsError);
      expect(() => skillDirIn(sandbox.source, '.')).toThrow(SkillsError);
    });
  });

  it('writeInstalledSkill should create the skill directory', () => {
    const root = globalDir(sandbox, 'gemini');
    const written = writeInstalledSkill(root, 'alpha', 'content\n');

    expect(written).toBe(join(root, 'alpha', 'SKILL.md'));
    expect(read(written)).toBe('content\n');
  });

  it('writeInstalledSkill should overwrite an existing install in its own directory', () => {
    const root = globalDir(sandbox, 'codex');
    writeSkill(root, 'a-legacy', skillContent('alpha', 'Stale.'));
    const [existing] = [...loadSandbox(sandbox).installs.codex.values()];

    const written = writeInstalledSkill(root, 'alpha', 'content\n', existing);

    expect(written).toBe(join(root, 'a-legacy', 'SKILL.md'));
    expect(read(written)).toBe('content\n');
    expect(existsSync(join(root, 'alpha'))).toBe(false);
  });

  it('removeInstalledSkill should delete the directory and tolerate a missing one', () => {
    writeSkill(globalDir(sandbox, 'claude'), 'alpha', skillContent('alpha'));
    const skillDir = join(globalDir(sandbox, 'claude'), 'alpha');

    removeInstalledSkill(skillDir);
    removeInstalledSkill(skillDir);

    expect(existsSync(skillDir)).toBe(false);
  });

  describe('moveSkillDir', () => {
    it('should move a skill directory, creating the parent', () => {
      writeSkill(sandbox.cwd, 'alpha', skillContent('alpha'));
      const target = join(globalDir(sandbox, 'claude'), 'alpha');

      moveSkillDir(join(sandbox.cwd, 'alpha'), target);

      expect(existsSync(join(sandbox.cwd, 'alpha'))).toBe(false);
      expect(read(join(target, 'SKILL.md'))).toBe(skillContent('alpha'));
    });

    it('should replace the destination only when asked', () => {
      writeSkill(sandbox.cwd, 'alpha', skillContent('alpha', 'New.'));
      writeSkill(globalDir(sandbox, 'claude'), 'alpha', skillContent('alpha', 'Old.'));
      writeSkill(globalDir(sandbox, 'claude'), join('alpha', 'extra'), 'leftover\n');
      const target = join(globalDir(sandbox, 'claude'), 'alpha');

      expect(() => moveSkillDir(join(sandbox.cwd, 'alpha'), target)).toThrow(SkillsError);
      moveSkillDir(join(sandbox.cwd, 'alpha'), target, true);

      expect(read(join(target, 'SKILL.md'))).toBe(skillContent('alpha', 'New.'));
      expect(existsSync(join(target, 'extra'))).toBe(false);
    });
  });

  describe('applySyncPlan', () => {
    it('should push the rendering to each target tool', () => {
      writeSkill(sandbox.source, 'alpha', skillContent('alpha', 'Run {{ tool }}.'), 2000);
      writeSkill(globalDir(sandbox, 'codex'), 'alpha', skillContent('alpha', 'Stale.'), 1000);
      const [plan] = planSync(loadSandbox(sandbox), collectDiagnostics().diagnostics);

      const outcome = applySyncPlan(plan, sandbox.paths);

      expect(outcome).toEqual({ name: 'alpha', pushed: ['codex'] });
      expect(read(join(globalDir(sandbox, 'codex'), 'alpha', 'SKILL.md'))).toBe(skillContent('alpha', 'Run codex.'));
    });

    it('should copy the pulled content into the source verbatim', () => {
      const sourcePath = writeSkill(sandbox.source, 'alpha', skillContent('alpha'), 1000);
      const edited = skillContent('alpha', 'Edited in codex.');
      writeSkill(globalDir(sandbox, 'codex'), 'alpha', edited, 2000);
      const [plan] = planSync(loadSandbox(sandbox), collectDiagnostics().diagnostics);

      const outcome = applySyncPlan(plan, sandbox.paths);

      expect(outcome).toEqual({ name: 'alpha', pushed: [], pulledFrom: 'codex' });
      expect(read(sourcePath)).toBe(edited);
    });

    it('should push pulled content on to the other differing tools', () => {
      const sourcePath = writeSkill(sandbox.source, 'alpha', skillContent('alpha'), 1000);
      const edited = skillContent('alpha', 'Edited in gemini.');
      writeSkill(globalDir(sandbox, 'claude'), 'alpha', skillContent('alpha', 'Older claude edit.'), 1500);
      writeSkill(globalDir(sandbox, 'gemini'), 'alpha', edited, 3000);
      const [plan] = planSync(loadSandbox(sandbox), collectDiagnostics().diagnostics);

      const outcome = applySyncPlan(plan, sandbox.paths);

      expect(outcome).toEqual({ name: 'alpha', pushed: ['claude'], pulledFrom: 'gemini' });
      expect(read(sourcePath)).toBe(edited);
      expect(read(join(globalDir(sandbox, 'claude'), 'alpha', 'SKILL.md'))).toBe(edited);
    });

    it('should update a tool copy whose directory is named differently from the skill', () => {
      writeSkill(sandbox.source, 'alpha', skillContent('alpha', 'Run {{ tool }}.'), 2000);
      writeSkill(globalDir(sandbox, 'codex'), 'a-legacy', skillContent('alpha', 'Stale.'), 1000);
      const diagnostics = collectDiagnostics().diagnostics;
      const [plan] = planSync(loadSandbox(sandbox), diagnostics);

      expect(plan.action).toEqual({ kind: 'push', toTools: ['codex'] });
      applySyncPlan(plan, sandbox.paths);

      expect(read(join(globalDir(sandbox, 'codex'), 'a-legacy', 'SKILL.md'))).toBe(skillContent('alpha', 'Run codex.'));
      expect(existsSync(join(globalDir(sandbox, 'codex'), 'alpha'))).toBe(false);
      expect(planSync(loadSandbox(sandbox), diagnostics)).toEqual([]);
    });

    it('should leave nothing to do after applying', () => {
      writeSkill(sandbox.source, 'alpha', skillContent('alpha', 'Run {{ tool }}.'), 2000);
      writeSkill(globalDir(sandbox, 'claude'), 'alpha', skillContent('alpha', 'Stale.'), 1000);
      writeSkill(globalDir(sandbox, 'codex'), 'alpha', skillContent('alpha', 'Stale.'), 1000);
      const diagnostics = collectDiagnostics().diagnostics;
      for (const plan of planSync(loadSandbox(sandbox), diagnostics)) {
        applySyncPlan(plan, sandbox.paths);
      }

      const catalog = loadSandbox(sandbox);

      expect(planSync(catalog, diagnostics)).toEqual([]);
      expect(classifySkills(catalog, diagnostics)[0].statuses).toEqual([
        { tool: 'claude', state: 'synced' },
        { tool: 'codex', state: 'synced' },
        { tool: 'gemini', state: 'missing' },
      ]);
    });
  });
});

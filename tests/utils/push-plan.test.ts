import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeInstalledSkill } from '../../src/utils/apply.js';
import { needsWrite, planPush, selectSourceSkills } from '../../src/utils/push-plan.js';
import { globalSkillsDir } from '../../src/utils/tools.js';
import { collectDiagnostics, createSandbox, globalDir, loadSandbox, skillContent, writeSkill } from '../helpers.js';
import type { Sandbox } from '../helpers.js';

describe('push planning', () => {
  let sandbox: Sandbox;

  beforeEach(() => {
    sandbox = createSandbox();
    writeSkill(sandbox.source, 'beta', skillContent('beta'));
    writeSkill(sandbox.source, 'alpha', skillContent('alpha', 'Hello {{ tool }}.'));
  });

  afterEach(() => {
    sandbox.cleanup();
  });

  it('should select every source skill in name order by default', () => {
    const catalog = loadSandbox(sandbox);
    expect(selectSourceSkills(catalog, []).map((skill) => skill.name)).toEqual(['alpha', 'beta']);
  });

  it('should reject unknown names', () => {
    const catalog = loadSandbox(sandbox);
    expect(() => selectSourceSkills(catalog, ['alpha', 'nope'])).toThrow('Skill not found: nope');
  });

  it('should classify new, unchanged and modified installs', () => {
    writeSkill(globalDir(sandbox, 'claude'), 'alpha', skillContent('alpha', 'Hello claude.'));
    writeSkill(globalDir(sandbox, 'codex'), 'alpha', skillContent('alpha', 'Hand edited.'));

    const items = planPush(
      loadSandbox(sandbox),
      { names: ['alpha'], tools: ['claude', 'codex', 'gemini'] },
      collectDiagnostics().diagnostics
    );

    expect(items.map((item) => [item.tool, item.status])).toEqual([
      ['claude', 'unchanged'],
      ['codex', 'modified'],
      ['gemini', 'new'],
    ]);
    expect(items[2].rendered).toBe(skillContent('alpha', 'Hello gemini.'));
    expect(items.map(needsWrite)).toEqual([false, true, true]);
  });

  it('should report everything unchanged on a second push', () => {
    const tools = ['claude', 'gemini'] as const;
    const diagnostics = collectDiagnostics().diagnostics;
    for (const item of planPush(loadSandbox(sandbox), { names: [], tools: [...tools] }, diagnostics)) {
      if (needsWrite(item)) {
        writeInstalledSkill(globalSkillsDir(item.tool, sandbox.paths), item.skill.name, item.rendered);
      }
    }

    const second = planPush(loadSandbox(sandbox), { names: [], tools: [...tools] }, diagnostics);

    expect(second).toHaveLength(4);
    expect(second.every((item) => item.status === 'unchanged')).toBe(true);
  });

  it('should skip pairs that fail to render', () => {
    const broken = writeSkill(sandbox.source, 'gamma', skillContent('gamma', '{{ nope }}'));
    const { diagnostics } = collectDiagnostics();

    const items = planPush(loadSandbox(sandbox, diagnostics), { names: ['gamma'], tools: ['codex'] }, diagnostics);

    expect(items).toEqual([]);
    expect(diagnostics.skipped).toEqual([{ path: broken, reason: "undefined variable 'nope'" }]);
  });
});

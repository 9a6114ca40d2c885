import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { renderCommand } from '../../src/commands/render.js';
import type { CommandDeps } from '../../src/commands/shared.js';
import { collectDiagnostics, createSandbox, skillContent, writeSkill } from '../helpers.js';
import type { Sandbox } from '../helpers.js';

describe('render command', () => {
  let sandbox: Sandbox;
  let deps: CommandDeps;
  let logs: string[];

  beforeEach(() => {
    sandbox = createSandbox();
    deps = { paths: sandbox.paths, env: sandbox.env, diagnostics: collectDiagnostics().diagnostics };
    logs = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logs.push(args.join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    sandbox.cleanup();
  });

  it('should print the rendering for one tool', async () => {
    writeSkill(sandbox.source, 'alpha', skillContent('alpha', 'For {{ tool }}.'));
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await renderCommand('alpha', { tool: 'codex' }, deps);

    expect(write).toHaveBeenCalledWith(skillContent('alpha', 'For codex.'));
    expect(logs).toEqual([]);
  });

  it('should fail for an unknown skill', async () => {
    await expect(renderCommand('nope', { tool: 'codex' }, deps)).rejects.toThrow('Skill not found: nope');
  });
});

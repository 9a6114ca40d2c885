import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'path';
import type { Decision } from '../../src/types.js';
import type { CommandDeps } from '../../src/commands/shared.js';
import { addSourceCommand, listSourcesCommand, removeSourceCommand } from '../../src/commands/source.js';
import { listSources } from '../../src/utils/config.js';
import { collectDiagnostics, createSandbox } from '../helpers.js';
import type { Sandbox } from '../helpers.js';

describe('source command', () => {
  let sandbox: Sandbox;
  let logs: string[];

  function deps(decision: Decision = 'confirm'): CommandDeps {
    return {
      paths: sandbox.paths,
      env: sandbox.env,
      diagnostics: collectDiagnostics().diagnostics,
      confirm: vi.fn(async () => decision),
    };
  }

  beforeEach(() => {
    sandbox = createSandbox();
    logs = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logs.push(args.join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    sandbox.cleanup();
  });

  it('should add, list and remove sources', async () => {
    const team = join(sandbox.root, 'team');

    await addSourceCommand(team, deps());
    expect(listSources(sandbox.paths, sandbox.env)).toEqual([sandbox.source, team]);

    logs.length = 0;
    await listSourcesCommand(deps());
    expect(logs).toContain(`  ${sandbox.source}`);
    expect(logs).toContain(`  ${team} (missing)`);

    await removeSourceCommand(team, { yes: true }, deps());
    expect(listSources(sandbox.paths, sandbox.env)).toEqual([sandbox.source]);
  });

  it('should keep the source when removal is declined', async () => {
    await removeSourceCommand(sandbox.source, {}, deps('decline'));
    expect(listSources(sandbox.paths, sandbox.env)).toEqual([sandbox.source]);
  });

  it('should fail to remove an unknown source', async () => {
    await expect(removeSourceCommand('/nowhere', { yes: true }, deps())).rejects.toThrow(
      "Source '/nowhere' is not configured"
    );
  });
});

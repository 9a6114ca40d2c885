import { mkdirSync, mkdtempSync, rmSync, utimesSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Catalog, Tool } from '../src/types.js';
import { loadCatalog } from '../src/utils/catalog.js';
import { Diagnostics } from '../src/utils/diagnostics.js';
import type { PathProvider } from '../src/utils/paths.js';

export interface Sandbox {
  root: string;
  home: string;
  cwd: string;
  source: string;
  configPath: string;
  paths: PathProvider;
  env: NodeJS.ProcessEnv;
  cleanup(): void;
}

/**
 * Temporary home, project and source directories with a config listing the source
 */
export function createSandbox(): Sandbox {
  const root = mkdtempSync(join(tmpdir(), 'skillsync-test-'));
  const home = join(root, 'home');
  const cwd = join(root, 'project');
  const source = join(root, 'skills');
  for (const dir of [home, cwd, source]) {
    mkdirSync(dir, { recursive: true });
  }

  const configPath = join(root, 'config.json');
  writeFileSync(configPath, JSON.stringify({ sources: [source] }));

  return {
    root,
    home,
    cwd,
    source,
    configPath,
    paths: { homeDir: () => home, cwd: () => cwd },
    env: { SKILLSYNC_CONFIG: configPath },
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}

export function skillContent(name: string, body = 'Do the thing.'): string {
  return `---\nname: ${name}\ndescription: ${name} skill\n---\n\n${body}\n`;
}

/**
 * Write <root>/<dir>/SKILL.md, optionally with an mtime in epoch seconds
 */
export function writeSkill(root: string, dir: string, contents: string, mtime?: number): string {
  const skillDir = join(root, dir);
  mkdirSync(skillDir, { recursive: true });
  const skillPath = join(skillDir, 'SKILL.md');
  writeFileSync(skillPath, contents);
  if (mtime !== undefined) {
    utimesSync(skillPath, mtime, mtime);
  }
  return skillPath;
}

export function globalDir(sandbox: Sandbox, tool: Tool): string {
  return join(sandbox.home, `.${tool}`, 'skills');
}

export function localDir(sandbox: Sandbox, tool: Tool): string {
  return join(sandbox.cwd, `.${tool}`, 'skills');
}

export interface CollectedDiagnostics {
  diagnostics: Diagnostics;
  lines: string[];
}

export function collectDiagnostics(): CollectedDiagnostics {
  const lines: string[] = [];
  return { diagnostics: new Diagnostics((line) => lines.push(line)), lines };
}

export function loadSandbox(sandbox: Sandbox, diagnostics: Diagnostics = collectDiagnostics().diagnostics): Catalog {
  return loadCatalog({ sources: [sandbox.source], paths: sandbox.paths, diagnostics });
}

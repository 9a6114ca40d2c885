import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import type { SkillsConfig } from '../types.js';
import { SkillsError, errorMessage } from './errors.js';
import { expandPath, systemPaths } from './paths.js';
import type { PathProvider } from './paths.js';

export const CONFIG_ENV_VAR = 'SKILLSYNC_CONFIG';

/**
 * Get the path to the configuration file
 */
export function getConfigPath(
  paths: PathProvider = systemPaths,
  env: NodeJS.ProcessEnv = process.env
): string {
  const override = env[CONFIG_ENV_VAR]?.trim();
  if (override) {
    return expandPath(override, paths.cwd(), paths);
  }
  return join(paths.homeDir(), '.skillsync', 'config.json');
}

function noSources(configPath: string): SkillsError {
  return new SkillsError(
    'config',
    `No sources configured; run \`skillsync source add <dir>\` or edit ${configPath}.`,
    { path: configPath }
  );
}

/**
 * Read the raw configuration file; a missing file is an empty config
 */
export function readConfig(configPath: string): SkillsConfig {
  if (!existsSync(configPath)) {
    return { sources: [] };
  }

  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new SkillsError('config', `Failed to read config at ${configPath}: ${errorMessage(error)}`, {
      path: configPath,
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new SkillsError('config', `Failed to parse config at ${configPath}: ${errorMessage(error)}`, {
      path: configPath,
      cause: error,
    });
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new SkillsError('config', `Failed to parse config at ${configPath}: expected a JSON object`, {
      path: configPath,
    });
  }

  const sources: unknown = 'sources' in parsed ? parsed.sources : undefined;
  if (sources === undefined) {
    return { sources: [] };
  }
  if (!Array.isArray(sources) || !sources.every((source): source is string => typeof source === 'string')) {
    throw new SkillsError('config', `Failed to parse config at ${configPath}: 'sources' must be a list of paths`, {
      path: configPath,
    });
  }
  return { sources };
}

/**
 * Expand configured sources to absolute paths, dropping duplicates
 */
export function resolveSources(config: SkillsConfig, configPath: string, paths: PathProvider = systemPaths): string[] {
  const baseDir = dirname(configPath);
  const resolved: string[] = [];
  for (const raw of config.sources) {
    if (!raw.trim()) continue;
    const expanded = expandPath(raw, baseDir, paths);
    if (!resolved.includes(expanded)) {
      resolved.push(expanded);
    }
  }
  return resolved;
}

/**
 * Load the configured source directories; fails when none are configured
 */
export function loadSources(paths: PathProvider = systemPaths, env: NodeJS.ProcessEnv = process.env): string[] {
  const configPath = getConfigPath(paths, env);
  const sources = resolveSources(readConfig(configPath), configPath, paths);
  if (sources.length === 0) {
    throw noSources(configPath);
  }
  return sources;
}

/**
 * Save the configuration file
 */
export function saveConfig(configPath: string, config: SkillsConfig): void {
  try {
    mkdirSync(dirname(configPath), { recursive: true });
    writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  } catch (error) {
    throw new SkillsError('config', `Failed to write config at ${configPath}: ${errorMessage(error)}`, {
      path: configPath,
      cause: error,
    });
  }
}

/**
 * Add a source directory to the configuration
 */
export function addSource(
  dir: string,
  paths: PathProvider = systemPaths,
  env: NodeJS.ProcessEnv = process.env
): string {
  const configPath = getConfigPath(paths, env);
  const config = readConfig(configPath);
  const expanded = expandPath(dir, paths.cwd(), paths);

  if (resolveSources(config, configPath, paths).includes(expanded)) {
    throw new SkillsError('config', `Source '${expanded}' is already configured`, { path: configPath });
  }

  saveConfig(configPath, { sources: [...config.sources, expanded] });
  return expanded;
}

/**
 * Remove a source directory from the configuration
 */
export function removeSource(
  dir: string,
  paths: PathProvider = systemPaths,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  const configPath = getConfigPath(paths, env);
  const config = readConfig(configPath);
  const target = expandPath(dir, paths.cwd(), paths);
  const baseDir = dirname(configPath);

  const remaining = config.sources.filter((raw) => expandPath(raw, baseDir, paths) !== target);
  if (remaining.length === config.sources.length) {
    return false;
  }

  saveConfig(configPath, { sources: remaining });
  return true;
}

/**
 * Configured sources for display; empty when none are set
 */
export function listSources(paths: PathProvider = systemPaths, env: NodeJS.ProcessEnv = process.env): string[] {
  const configPath = getConfigPath(paths, env);
  return resolveSources(readConfig(configPath), configPath, paths);
}

import { homedir } from 'os';
import { isAbsolute, join, resolve, sep } from 'path';

/**
 * Access to the process environment the catalog depends on.
 * Tests supply a provider rooted in a temporary directory.
 */
export interface PathProvider {
  /** Throws when the home directory cannot be resolved */
  homeDir(): string;
  cwd(): string;
}

export const systemPaths: PathProvider = {
  homeDir() {
    const home = homedir();
    if (!home) {
      throw new Error('Failed to resolve the home directory.');
    }
    return home;
  },
  cwd() {
    return process.cwd();
  },
};

/**
 * Expand a leading ~ and resolve relative paths against baseDir
 */
export function expandPath(raw: string, baseDir: string, paths: PathProvider = systemPaths): string {
  const trimmed = raw.trim();
  if (trimmed === '~') {
    return paths.homeDir();
  }
  if (trimmed.startsWith('~/')) {
    return join(paths.homeDir(), trimmed.slice(2));
  }
  if (isAbsolute(trimmed)) {
    return resolve(trimmed);
  }
  return resolve(baseDir, trimmed);
}

/**
 * Render a path for output, abbreviating the home directory to ~
 */
export function displayPath(path: string, paths: PathProvider = systemPaths): string {
  let home: string;
  try {
    home = paths.homeDir();
  } catch {
    return path;
  }
  if (path === home) return '~';
  if (path.startsWith(home + sep)) {
    return `~${sep}${path.slice(home.length + 1)}`;
  }
  return path;
}

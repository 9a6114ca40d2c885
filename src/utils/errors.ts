export type SkillsErrorCode =
  | 'config'
  | 'not-found'
  | 'render'
  | 'io'
  | 'conflict'
  | 'canceled'
  | 'invalid';

/**
 * Error surfaced to the user; the CLI prints the message and exits non-zero
 */
export class SkillsError extends Error {
  readonly code: SkillsErrorCode;
  readonly path?: string;

  constructor(code: SkillsErrorCode, message: string, options: { path?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SkillsError';
    this.code = code;
    this.path = options.path;
  }
}

export function skillNotFound(name: string): SkillsError {
  return new SkillsError('not-found', `Skill not found: ${name}`);
}

export function promptCanceled(): SkillsError {
  return new SkillsError('canceled', 'Prompt canceled.');
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || 'unknown error';
  if (typeof err === 'string') return err || 'unknown error';
  try {
    return JSON.stringify(err);
  } catch {
    return 'unknown error';
  }
}

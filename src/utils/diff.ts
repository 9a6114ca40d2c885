import { createTwoFilesPatch } from 'diff';

/**
 * Unified diff with three lines of context and `---`/`+++` labels.
 * Empty when the texts are equal.
 */
export function unifiedDiff(oldLabel: string, newLabel: string, oldText: string, newText: string): string {
  if (oldText === newText) return '';
  const patch = createTwoFilesPatch(oldLabel, newLabel, oldText, newText, undefined, undefined, { context: 3 });
  const lines = patch.split('\n');
  const start = lines.findIndex((line) => line.startsWith('--- '));
  return lines.slice(start < 0 ? 0 : start).join('\n');
}

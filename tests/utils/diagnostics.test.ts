import { describe, it, expect } from 'vitest';
import { collectDiagnostics } from '../helpers.js';

describe('Diagnostics', () => {
  it('should write warnings immediately', () => {
    const { diagnostics, lines } = collectDiagnostics();

    diagnostics.warn('source directory not found: /nowhere');

    expect(lines).toEqual(['Warning: source directory not found: /nowhere']);
    expect(diagnostics.warningCount).toBe(1);
  });

  it('should hold skipped skills until the summary', () => {
    const { diagnostics, lines } = collectDiagnostics();

    diagnostics.skip('/skills/a/SKILL.md', 'missing YAML frontmatter');
    diagnostics.skip('/skills/b/SKILL.md', "undefined variable 'x'");
    expect(lines).toEqual([]);

    diagnostics.warn('careful');
    diagnostics.printSummary();

    expect(lines).toEqual([
      'Warning: careful',
      'Skipped 2 skill(s) due to errors:',
      '  - /skills/a/SKILL.md: missing YAML frontmatter',
      "  - /skills/b/SKILL.md: undefined variable 'x'",
      'Completed with 1 warning(s).',
    ]);
  });

  it('should print nothing when the run was clean', () => {
    const { diagnostics, lines } = collectDiagnostics();
    diagnostics.printSummary();
    expect(lines).toEqual([]);
  });
});

import { basename, sep } from 'path';
import { TOOLS } from '../types.js';
import type { SourceSkill } from '../types.js';
import { sortByName } from '../utils/catalog.js';
import { SkillsError, errorMessage, skillNotFound } from '../utils/errors.js';
import { parseFrontmatter } from '../utils/frontmatter.js';
import { dim, error, success } from '../utils/palette.js';
import { displayPath } from '../utils/paths.js';
import { renderSkill } from '../utils/render.js';
import { withCatalog } from './shared.js';
import type { CommandDeps } from './shared.js';

export interface ValidationReport {
  valid: string[];
  invalid: { path: string; problems: string[] }[];
}

/**
 * Problems with one source skill; empty when it is valid
 */
export function validateSkill(skill: SourceSkill): string[] {
  const problems: string[] = [];
  try {
    const metadata = parseFrontmatter(skill.contents);
    const dirName = basename(skill.skillDir);
    if (metadata.name !== dirName) {
      problems.push(`frontmatter name '${metadata.name}' does not match directory name '${dirName}'`);
    }
  } catch (err) {
    problems.push(`frontmatter: ${errorMessage(err)}`);
  }

  for (const tool of TOOLS) {
    const rendered = renderSkill(skill.contents, tool);
    if (!rendered.ok) problems.push(`template (${tool}): ${rendered.error}`);
  }
  return problems;
}

function isWithin(path: string, roots: string[]): boolean {
  return roots.some((root) => path.startsWith(root.endsWith(sep) ? root : `${root}${sep}`));
}

/**
 * Check frontmatter and templates of source skills
 */
export async function validateSkills(name: string | undefined, deps: CommandDeps = {}): Promise<ValidationReport> {
  return withCatalog(deps, async ({ catalog, diagnostics, paths, sources }) => {
    const report: ValidationReport = { valid: [], invalid: [] };

    let skills: SourceSkill[];
    if (name !== undefined) {
      const skill = catalog.sources.get(name);
      if (!skill) throw skillNotFound(name);
      skills = [skill];
    } else {
      skills = sortByName([...catalog.sources.values()]);
      // skills the loader already rejected still count as invalid
      for (const skipped of diagnostics.skipped) {
        if (isWithin(skipped.path, sources)) {
          report.invalid.push({ path: skipped.path, problems: [skipped.reason] });
        }
      }
    }

    for (const skill of skills) {
      const problems = validateSkill(skill);
      if (problems.length === 0) {
        report.valid.push(skill.name);
      } else {
        report.invalid.push({ path: skill.skillPath, problems });
      }
    }

    if (report.valid.length + report.invalid.length === 0) {
      console.log(dim('No skills to validate.'));
      return report;
    }

    for (const valid of report.valid) {
      console.log(success('✓') + ` ${valid}`);
    }
    for (const invalid of report.invalid) {
      console.log(error('✗') + ` ${displayPath(invalid.path, paths)}`);
      for (const problem of invalid.problems) {
        console.log(dim(`    ${problem}`));
      }
    }
    console.log(`\n${report.valid.length} valid, ${report.invalid.length} invalid`);

    if (report.invalid.length > 0) {
      throw new SkillsError('invalid', `${report.invalid.length} skill(s) failed validation.`);
    }
    return report;
  });
}

import chalk from 'chalk';

export interface SkippedSkill {
  path: string;
  reason: string;
}

export type DiagnosticsWriter = (line: string) => void;

/**
 * Collects warnings and skipped skill files for one command run.
 *
 * Warnings are written as they happen; skipped files are held back and
 * printed together by printSummary() so large catalogs end with one list.
 */
export class Diagnostics {
  private readonly warnings: string[] = [];
  private readonly skippedSkills: SkippedSkill[] = [];

  constructor(private readonly writer: DiagnosticsWriter = (line) => console.error(line)) {}

  warn(message: string): void {
    this.warnings.push(message);
    this.emit(chalk.yellow(`Warning: ${message}`));
  }

  /**
   * Continuation line for the previous warning
   */
  note(message: string): void {
    this.emit(chalk.dim(message));
  }

  skip(path: string, reason: string): void {
    this.skippedSkills.push({ path, reason });
  }

  get warningCount(): number {
    return this.warnings.length;
  }

  get skipped(): readonly SkippedSkill[] {
    return this.skippedSkills;
  }

  printSummary(): void {
    if (this.skippedSkills.length > 0) {
      this.emit(chalk.yellow(`Skipped ${this.skippedSkills.length} skill(s) due to errors:`));
      for (const skipped of this.skippedSkills) {
        this.emit(`  - ${skipped.path}: ${skipped.reason}`);
      }
    }
    if (this.warnings.length > 0) {
      this.emit(chalk.dim(`Completed with ${this.warnings.length} warning(s).`));
    }
  }

  private emit(line: string): void {
    this.writer(line);
  }
}

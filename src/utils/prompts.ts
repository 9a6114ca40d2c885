import chalk from 'chalk';
import { confirm, select } from '@inquirer/prompts';
import { ExitPromptError } from '@inquirer/core';
import type { Decision, PullPlan, PullVariant, VariantChoice } from '../types.js';
import { promptCanceled } from './errors.js';
import { displayPath } from './paths.js';
import { formatAge } from './pull-plan.js';
import type { VariantChooser } from './pull-plan.js';
import { toolDisplayName } from './tools.js';

/**
 * Ask a yes/no question; Ctrl+C maps to 'cancel'
 */
export async function confirmDecision(message: string): Promise<Decision> {
  try {
    const answer = await confirm({ message: chalk.yellow(message), default: false });
    return answer ? 'confirm' : 'decline';
  } catch (error) {
    if (error instanceof ExitPromptError) {
      return 'cancel';
    }
    throw error;
  }
}

/**
 * Run a prompt, turning Ctrl+C into a cancellation error
 */
async function ask<T>(prompt: () => Promise<T>): Promise<T> {
  try {
    return await prompt();
  } catch (error) {
    if (error instanceof ExitPromptError) {
      throw promptCanceled();
    }
    throw error;
  }
}

export function describeVariant(variant: PullVariant): string {
  const { skill } = variant;
  return `${toolDisplayName(skill.tool)} (${skill.origin})`;
}

async function pickVariant(plan: PullPlan, message: string, exclude?: number): Promise<number> {
  return ask(() =>
    select<number>({
      message,
      choices: plan.variants
        .map((variant, index) => ({ name: describeVariant(variant), value: index }))
        .filter((choice) => choice.value !== exclude),
    })
  );
}

/**
 * Chooser backed by terminal prompts
 */
export function createPromptChooser(showDiff: (left: PullVariant, right: PullVariant) => void): VariantChooser {
  return {
    async confirm(plan, variant) {
      const action = variant.orphan ? 'Create skill' : 'Pull changes for';
      return confirmDecision(`${action} '${plan.name}' from ${describeVariant(variant)}?`);
    },

    async choose(plan): Promise<VariantChoice> {
      console.log(`${chalk.bold(plan.name)} has different modifications in multiple places:\n`);
      plan.variants.forEach((variant, index) => {
        console.log(
          `  [${index + 1}] ${describeVariant(variant)}  ${chalk.dim(
            `(modified ${formatAge(variant.skill.modified)}, ${displayPath(variant.skill.skillPath)})`
          )}`
        );
      });
      console.log('');

      try {
        const picked = await select<number | 'diff' | 'skip'>({
          message: 'Which version to pull?',
          choices: [
            ...plan.variants.map((variant, index) => ({
              name: `[${index + 1}] ${describeVariant(variant)}`,
              value: index,
            })),
            { name: 'Show diff between versions', value: 'diff' as const },
            { name: 'Skip', value: 'skip' as const },
          ],
          default: 'skip',
        });

        if (picked === 'skip') return { kind: 'skip' };
        if (picked === 'diff') {
          if (plan.variants.length === 2) return { kind: 'diff', left: 0, right: 1 };
          const left = await pickVariant(plan, 'Diff from');
          const right = await pickVariant(plan, 'Diff to', left);
          return { kind: 'diff', left, right };
        }
        return { kind: 'select', index: picked };
      } catch (error) {
        if (error instanceof ExitPromptError) {
          return { kind: 'cancel' };
        }
        throw error;
      }
    },

    async showDiff(left, right) {
      showDiff(left, right);
    },
  };
}

/**
 * Ask which configured source root a new skill should go to
 */
export async function chooseSourceRoot(sources: string[]): Promise<string> {
  return ask(() =>
    select<string>({
      message: 'Select target source',
      choices: sources.map((source) => ({ name: displayPath(source), value: source })),
      default: sources[0],
    })
  );
}

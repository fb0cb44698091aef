import chalk from 'chalk';
import Table from 'cli-table3';
import { ExitCode, type ExitStatus, describeError, exitCodeFor } from '../utils/errors';
import { Logger } from '../utils/logger';

export type StepStatus = 'passed' | 'failed' | 'error' | 'skipped';

export type StepResult = { exitCode: number; detail?: string } | { skipped: true; detail: string };

export interface HookStep {
  name: string;
  run: () => Promise<StepResult>;
}

export interface StepOutcome {
  name: string;
  status: StepStatus;
  exitCode: number;
  detail?: string;
}

export interface DispatchResult {
  outcomes: StepOutcome[];
  exitCode: ExitStatus;
}

export interface DispatchOptions {
  print?: (line: string) => void;
  logger?: Logger;
  /** Printed with the verdict, e.g. `push`. */
  action?: string;
}

const STATUS_LABEL: Record<StepStatus, string> = {
  passed: chalk.green('passed'),
  failed: chalk.red('failed'),
  error: chalk.magenta('error'),
  skipped: chalk.gray('skipped'),
};

function toOutcome(name: string, result: StepResult): StepOutcome {
  if ('skipped' in result) {
    return { name, status: 'skipped', exitCode: 0, detail: result.detail };
  }
  return {
    name,
    status: result.exitCode === 0 ? 'passed' : 'failed',
    exitCode: result.exitCode,
    detail: result.detail,
  };
}

/** Nonzero if any step was nonzero. */
export function aggregateExitCode(outcomes: readonly StepOutcome[]): ExitStatus {
  return outcomes.some((outcome) => outcome.exitCode !== 0) ? ExitCode.Violations : ExitCode.Ok;
}

export function renderSummary(outcomes: readonly StepOutcome[]): string {
  const table = new Table({
    head: ['Step', 'Result', 'Exit', 'Detail'],
    style: { head: ['cyan'] },
  });
  for (const outcome of outcomes) {
    table.push([outcome.name, STATUS_LABEL[outcome.status], String(outcome.exitCode), outcome.detail ?? '']);
  }
  return table.toString();
}

/**
 * Runs every step in order. A step that throws is recorded as `error` and the
 * remaining steps still run.
 */
export async function dispatch(steps: readonly HookStep[], options: DispatchOptions = {}): Promise<DispatchResult> {
  const print = options.print ?? ((line: string) => console.log(line));
  const logger = options.logger ?? new Logger(null, 'dispatch');
  const outcomes: StepOutcome[] = [];

  for (const step of steps) {
    let outcome: StepOutcome;
    try {
      outcome = toOutcome(step.name, await step.run());
    } catch (error: unknown) {
      outcome = { name: step.name, status: 'error', exitCode: exitCodeFor(error), detail: describeError(error) };
    }
    logger.info(`Step ${step.name}: ${outcome.status}`, { exitCode: outcome.exitCode });
    outcomes.push(outcome);
  }

  const exitCode = aggregateExitCode(outcomes);
  print('');
  print(renderSummary(outcomes));
  const action = options.action ?? 'operation';
  print(exitCode === 0 ? chalk.green(`✓ All checks passed, ${action} allowed`) : chalk.red(`✗ Checks failed, ${action} blocked`));

  return { outcomes, exitCode };
}

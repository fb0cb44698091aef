import chalk from 'chalk';
import { ExitCode, type ExitStatus, describeError, exitCodeFor } from '../utils/errors';
import { Logger } from '../utils/logger';
import { extractFromDirectory } from './extractor';
import { type WorkflowReference, describeKind, isViolation } from './references';

export interface PinCheckReport {
  references: WorkflowReference[];
  violations: WorkflowReference[];
}

export interface PinCheckOptions {
  dir: string;
  quiet?: boolean;
  print?: (line: string) => void;
  logger?: Logger;
}

export async function checkPins(dir: string): Promise<PinCheckReport> {
  const references = await extractFromDirectory(dir);
  return { references, violations: references.filter(isViolation) };
}

export function formatViolation(reference: WorkflowReference): string {
  const status = reference.pinStatus === 'malformed' ? chalk.magenta('malformed') : chalk.yellow('unpinned');
  return `  ${chalk.bold(`${reference.file}:${reference.lineNumber}`)} ${status} ${describeKind(reference.kind)} ${reference.rawValue || '""'}: ${reference.reason ?? 'not pinned'}`;
}

/** 0 when every non-local reference is pinned, 1 on violations, 3 when the directory cannot be read. */
export async function pincheck(options: PinCheckOptions): Promise<ExitStatus> {
  const print = options.print ?? ((line: string) => console.log(line));
  const logger = options.logger ?? new Logger(null, 'pincheck');

  let report: PinCheckReport;
  try {
    report = await checkPins(options.dir);
  } catch (error: unknown) {
    logger.error(describeError(error));
    print(chalk.red(`✗ Pin check could not run: ${describeError(error)}`));
    return exitCodeFor(error);
  }

  logger.info('Pin check finished', {
    dir: options.dir,
    references: report.references.length,
    violations: report.violations.length,
  });

  if (report.violations.length === 0) {
    if (!options.quiet) {
      print(chalk.green(`✓ All ${report.references.length} workflow reference(s) are pinned`));
    }
    return ExitCode.Ok;
  }

  print(chalk.red(`✗ ${report.violations.length} workflow reference(s) are not pinned:`));
  for (const reference of report.violations) {
    print(formatViolation(reference));
  }
  if (!options.quiet) {
    print(chalk.gray('Run `pushgate autopin` to pin actions to commit SHAs and images to digests.'));
  }
  return ExitCode.Violations;
}

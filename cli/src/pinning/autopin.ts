import fs from 'fs';
import chalk from 'chalk';
import type { PinResolver } from '@pushgate/sdk';
import { withTransaction } from '../transaction/transaction';
import { ExitCode, type ExitStatus, TransactionError, describeError, exitCodeFor } from '../utils/errors';
import { Logger } from '../utils/logger';
import { extractFromDirectory } from './extractor';
import { formatViolation } from './validator';
import { type WorkflowReference, describeKind, splitActionValue } from './references';

const DOCKER_SCHEME = 'docker://';

export interface PinDecision {
  reference: WorkflowReference;
  rewrittenValue?: string;
  /** Tag kept as a trailing comment (actions only). */
  tagComment?: string;
  error?: string;
}

export interface AutopinOptions {
  dir: string;
  actions?: boolean;
  images?: boolean;
  resolver: PinResolver;
  quiet?: boolean;
  print?: (line: string) => void;
  logger?: Logger;
}

export interface AutopinReport {
  decisions: PinDecision[];
  malformed: WorkflowReference[];
  filesChanged: string[];
}

type PinTarget = 'actions' | 'images';

function targetOf(reference: WorkflowReference): PinTarget {
  if (reference.kind === 'action' && !reference.rawValue.startsWith(DOCKER_SCHEME)) {
    return 'actions';
  }
  return 'images';
}

export async function decide(reference: WorkflowReference, resolver: PinResolver): Promise<PinDecision> {
  try {
    if (reference.kind === 'action' && !reference.rawValue.startsWith(DOCKER_SCHEME)) {
      const parts = splitActionValue(reference.rawValue);
      if (!parts) {
        return { reference, error: 'cannot split into owner/repo@ref' };
      }
      const sha = await resolver.resolveAction({ owner: parts.owner, repo: parts.repo, ref: parts.ref });
      const name = parts.path ? `${parts.owner}/${parts.repo}/${parts.path}` : `${parts.owner}/${parts.repo}`;
      return { reference, rewrittenValue: `${name}@${sha}`, tagComment: parts.ref };
    }

    const dockerAction = reference.rawValue.startsWith(DOCKER_SCHEME);
    const image = dockerAction ? reference.rawValue.slice(DOCKER_SCHEME.length) : reference.rawValue;
    const digest = await resolver.resolveImage(image);
    return { reference, rewrittenValue: `${dockerAction ? DOCKER_SCHEME : ''}${image}@${digest}` };
  } catch (error: unknown) {
    return { reference, error: describeError(error) };
  }
}

/**
 * Splices the pinned value into its line. Actions get the old tag as a
 * trailing comment, ahead of any comment the line already had.
 */
export function rewriteLine(line: string, decision: PinDecision): string {
  const { layout } = decision.reference;
  if (decision.rewrittenValue === undefined) {
    return line;
  }
  const head = `${line.slice(0, layout.valueStart)}${decision.rewrittenValue}`;
  if (decision.tagComment === undefined) {
    return `${head}${line.slice(layout.valueEnd)}`;
  }
  const comment = layout.comment ? ` ${layout.comment}` : '';
  return `${head}${layout.quote} # ${decision.tagComment}${comment}`;
}

export function applyDecisions(content: string, decisions: readonly PinDecision[]): string {
  const lines = content.split('\n');
  const ordered = [...decisions].sort(
    (a, b) =>
      a.reference.lineNumber - b.reference.lineNumber || b.reference.layout.valueStart - a.reference.layout.valueStart,
  );
  for (const decision of ordered) {
    const index = decision.reference.lineNumber - 1;
    const original = lines[index];
    const carriageReturn = original.endsWith('\r') ? '\r' : '';
    const body = carriageReturn ? original.slice(0, -1) : original;
    lines[index] = `${rewriteLine(body, decision)}${carriageReturn}`;
  }
  return lines.join('\n');
}

export async function runAutopin(options: AutopinOptions): Promise<AutopinReport> {
  // Both kinds only when neither was chosen; an explicit false turns its kind off.
  const enabled: Record<PinTarget, boolean> =
    options.actions === undefined && options.images === undefined
      ? { actions: true, images: true }
      : { actions: options.actions ?? false, images: options.images ?? false };

  const references = (await extractFromDirectory(options.dir)).filter((reference) => enabled[targetOf(reference)]);
  const malformed = references.filter((reference) => reference.pinStatus === 'malformed');
  const floating = references.filter((reference) => reference.pinStatus === 'floatingTag');

  const decisions: PinDecision[] = [];
  for (const reference of floating) {
    decisions.push(await decide(reference, options.resolver));
  }

  const byFile = new Map<string, PinDecision[]>();
  for (const decision of decisions) {
    if (decision.rewrittenValue === undefined) continue;
    const list = byFile.get(decision.reference.file) ?? [];
    list.push(decision);
    byFile.set(decision.reference.file, list);
  }

  const filesChanged = [...byFile.keys()];
  if (filesChanged.length > 0) {
    await withTransaction(
      'autopin',
      async (tx) => {
        for (const [file, fileDecisions] of byFile) {
          const content = await fs.promises.readFile(file, 'utf-8');
          const temp = `${file}.pushgate-tmp-${process.pid}`;
          tx.atomicWrite(temp, applyDecisions(content, fileDecisions));
          tx.atomicMove(temp, file);
        }
      },
      { logger: options.logger },
    );
  }

  return { decisions, malformed, filesChanged };
}

/**
 * 0 when nothing needed pinning, 2 when every floating reference was
 * rewritten, 1 when a lookup failed or malformed references remain.
 */
export async function autopin(options: AutopinOptions): Promise<ExitStatus> {
  const print = options.print ?? ((line: string) => console.log(line));
  const logger = options.logger ?? new Logger(null, 'autopin');

  let report: AutopinReport;
  try {
    report = await runAutopin({ ...options, logger });
  } catch (error: unknown) {
    logger.error(describeError(error));
    print(chalk.red(`✗ Autopin could not run: ${describeError(error)}`));
    return error instanceof TransactionError ? ExitCode.OperationalError : exitCodeFor(error);
  }

  const pinned = report.decisions.filter((decision) => decision.rewrittenValue !== undefined);
  const failed = report.decisions.filter((decision) => decision.error !== undefined);
  logger.info('Autopin finished', {
    dir: options.dir,
    pinned: pinned.length,
    failed: failed.length,
    malformed: report.malformed.length,
  });

  if (!options.quiet) {
    for (const decision of pinned) {
      const { reference } = decision;
      print(
        `  ${chalk.green('pinned')} ${chalk.bold(`${reference.file}:${reference.lineNumber}`)} ${describeKind(reference.kind)} ${reference.rawValue} -> ${decision.rewrittenValue}`,
      );
    }
  }
  for (const decision of failed) {
    const { reference } = decision;
    print(
      `  ${chalk.red('failed')} ${chalk.bold(`${reference.file}:${reference.lineNumber}`)} ${describeKind(reference.kind)} ${reference.rawValue}: ${decision.error}`,
    );
  }
  for (const reference of report.malformed) {
    print(formatViolation(reference));
  }

  if (failed.length > 0 || report.malformed.length > 0) {
    print(chalk.red(`✗ ${failed.length + report.malformed.length} reference(s) still need manual pinning`));
    return ExitCode.Violations;
  }
  if (pinned.length === 0) {
    if (!options.quiet) {
      print(chalk.green('✓ Nothing to pin'));
    }
    return ExitCode.Ok;
  }
  print(chalk.yellow(`✓ Pinned ${pinned.length} reference(s) in ${report.filesChanged.length} file(s); review and commit the changes`));
  return ExitCode.Remediated;
}
